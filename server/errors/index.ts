import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import type { CertificateStatus } from '@shared/schema';
import { logger } from '../logger';
import { getCorrelationId } from '../middleware/correlation-id';

export interface RFC7807ProblemDetail {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  errors?: Array<{ path: string; message: string }>;
  traceId?: string;
  timestamp?: string;
  [extension: string]: unknown;
}

const ERROR_TYPE_BASE = '/errors/';

export abstract class APIError extends Error {
  abstract readonly status: number;
  abstract readonly type: string;
  abstract readonly title: string;
  readonly detail?: string;
  readonly errors?: Array<{ path: string; message: string }>;

  constructor(message: string, detail?: string, errors?: Array<{ path: string; message: string }>) {
    super(message);
    this.name = this.constructor.name;
    this.detail = detail;
    this.errors = errors;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Structured members added to the problem document by domain errors. */
  protected extensions(): Record<string, unknown> {
    return {};
  }

  toRFC7807(req: Request): RFC7807ProblemDetail {
    return {
      type: `${ERROR_TYPE_BASE}${this.type}`,
      title: this.title,
      status: this.status,
      detail: this.detail || this.message,
      instance: req.originalUrl,
      errors: this.errors,
      traceId: getCorrelationId(req),
      timestamp: new Date().toISOString(),
      ...this.extensions(),
    };
  }
}

export class BadRequestError extends APIError {
  readonly status = 400;
  readonly type = 'bad-request';
  readonly title = 'Bad Request';

  constructor(detail?: string, errors?: Array<{ path: string; message: string }>) {
    super('Bad Request', detail, errors);
  }
}

export class ValidationError extends APIError {
  readonly status = 400;
  readonly type = 'validation-error';
  readonly title = 'Validation Error';

  constructor(detail?: string, errors?: Array<{ path: string; message: string }>) {
    super('Validation Error', detail, errors);
  }

  static fromZodError(error: ZodError): ValidationError {
    const errors = error.errors.map(e => ({
      path: e.path.join('.'),
      message: e.message,
    }));
    return new ValidationError('Request validation failed', errors);
  }
}

export class UnauthorizedError extends APIError {
  readonly status = 401;
  readonly type = 'unauthorized';
  readonly title = 'Unauthorized';

  constructor(detail: string = 'Authentication required') {
    super('Unauthorized', detail);
  }
}

export class ForbiddenError extends APIError {
  readonly status = 403;
  readonly type = 'forbidden';
  readonly title = 'Forbidden';

  constructor(detail: string = 'Access denied') {
    super('Forbidden', detail);
  }
}

export class NotFoundError extends APIError {
  readonly status = 404;
  readonly type = 'not-found';
  readonly title = 'Not Found';

  constructor(resource?: string) {
    const detail = resource ? `${resource} not found` : 'Resource not found';
    super('Not Found', detail);
  }
}

export class PayloadTooLargeError extends APIError {
  readonly status = 413;
  readonly type = 'payload-too-large';
  readonly title = 'Payload Too Large';

  constructor(detail: string = 'The request payload is too large') {
    super('Payload Too Large', detail);
  }
}

export class InternalServerError extends APIError {
  readonly status = 500;
  readonly type = 'internal-error';
  readonly title = 'Internal Server Error';

  constructor(detail: string = 'An unexpected error occurred') {
    super('Internal Server Error', detail);
  }
}

// Upload could not be turned into a canonical image.

export type FormatErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'CORRUPT_INPUT'
  | 'PASSWORD_PROTECTED'
  | 'CONVERSION_TOOL_UNAVAILABLE'
  | 'FILE_TOO_LARGE';

const FORMAT_ERROR_STATUS: Record<FormatErrorCode, number> = {
  UNSUPPORTED_FORMAT: 415,
  CORRUPT_INPUT: 422,
  PASSWORD_PROTECTED: 422,
  CONVERSION_TOOL_UNAVAILABLE: 503,
  FILE_TOO_LARGE: 413,
};

export class FormatError extends APIError {
  readonly status: number;
  readonly type = 'format-error';
  readonly title = 'Unusable Upload';
  readonly code: FormatErrorCode;
  readonly declaredType?: string;

  constructor(code: FormatErrorCode, detail: string, declaredType?: string) {
    super(`Format error: ${code}`, detail);
    this.code = code;
    this.status = FORMAT_ERROR_STATUS[code];
    this.declaredType = declaredType;
  }

  protected override extensions(): Record<string, unknown> {
    return { code: this.code, declaredType: this.declaredType };
  }
}

export type ExtractionErrorCode = 'RECOGNITION_REJECTED' | 'RECOGNITION_UNAVAILABLE' | 'CANCELLED';

const EXTRACTION_ERROR_STATUS: Record<ExtractionErrorCode, number> = {
  RECOGNITION_REJECTED: 502,
  RECOGNITION_UNAVAILABLE: 503,
  CANCELLED: 408,
};

export class ExtractionError extends APIError {
  readonly status: number;
  readonly type = 'extraction-error';
  readonly title = 'Extraction Failed';
  readonly code: ExtractionErrorCode;
  readonly attempts: number;
  readonly provider: string;

  constructor(code: ExtractionErrorCode, detail: string, context: { attempts: number; provider: string }) {
    super(`Extraction error: ${code}`, detail);
    this.code = code;
    this.status = EXTRACTION_ERROR_STATUS[code];
    this.attempts = context.attempts;
    this.provider = context.provider;
  }

  protected override extensions(): Record<string, unknown> {
    return { code: this.code, attempts: this.attempts, provider: this.provider };
  }
}

export type ReconciliationErrorCode =
  | 'ROLE_NOT_PERMITTED'
  | 'FIELD_AUTHORITY_CONFLICT'
  | 'INVALID_FIELD_FORMAT'
  | 'MALFORMED_PRIOR_DRAFT';

export class ReconciliationError extends APIError {
  readonly status: number;
  readonly type = 'reconciliation-error';
  readonly title = 'Reconciliation Failed';
  readonly code: ReconciliationErrorCode;
  readonly fields: string[];
  readonly role?: string;

  constructor(code: ReconciliationErrorCode, detail: string, context: { fields?: string[]; role?: string } = {}) {
    super(`Reconciliation error: ${code}`, detail);
    this.code = code;
    this.status = code === 'ROLE_NOT_PERMITTED' ? 403 : 422;
    this.fields = context.fields ?? [];
    this.role = context.role;
  }

  protected override extensions(): Record<string, unknown> {
    return { code: this.code, fields: this.fields, role: this.role };
  }
}

export type StateErrorCode =
  | 'DEADLINE_PASSED'
  | 'RECORD_IMMUTABLE'
  | 'MISSING_REQUIRED_FIELDS'
  | 'CONFLICT'
  | 'INVALID_TRANSITION';

const STATE_ERROR_STATUS: Record<StateErrorCode, number> = {
  DEADLINE_PASSED: 403,
  RECORD_IMMUTABLE: 409,
  MISSING_REQUIRED_FIELDS: 422,
  CONFLICT: 409,
  INVALID_TRANSITION: 409,
};

export interface StateErrorContext {
  fields?: string[];
  currentStatus?: CertificateStatus | null;
  deadline?: Date | null;
}

export class StateError extends APIError {
  readonly status: number;
  readonly type = 'state-error';
  readonly title = 'Transition Rejected';
  readonly code: StateErrorCode;
  readonly fields: string[];
  readonly currentStatus: CertificateStatus | null;
  readonly deadline: Date | null;

  constructor(code: StateErrorCode, detail: string, context: StateErrorContext = {}) {
    super(`State error: ${code}`, detail);
    this.code = code;
    this.status = STATE_ERROR_STATUS[code];
    this.fields = context.fields ?? [];
    this.currentStatus = context.currentStatus ?? null;
    this.deadline = context.deadline ?? null;
  }

  protected override extensions(): Record<string, unknown> {
    return {
      code: this.code,
      fields: this.fields,
      currentStatus: this.currentStatus,
      deadline: this.deadline ? this.deadline.toISOString() : null,
    };
  }
}

function bodyParserProblem(err: Error): APIError | undefined {
  if (!('type' in err)) return undefined;
  if (err.type === 'entity.too.large') return new PayloadTooLargeError();
  if (err.type === 'entity.parse.failed') return new BadRequestError('Malformed JSON body');
  return undefined;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = getCorrelationId(req);
  const apiError = err instanceof APIError ? err : bodyParserProblem(err);

  if (apiError) {
    const problemDetail = apiError.toRFC7807(req);

    if (apiError.status >= 500) {
      logger.error({ err, requestId, path: req.path }, apiError.message);
    } else {
      logger.warn({ err, requestId, path: req.path }, apiError.message);
    }

    res.status(apiError.status).json(problemDetail);
    return;
  }

  if (err instanceof ZodError) {
    const validationError = ValidationError.fromZodError(err);
    const problemDetail = validationError.toRFC7807(req);

    logger.warn({ err, requestId, path: req.path }, 'Validation error');
    res.status(400).json(problemDetail);
    return;
  }

  logger.error({ err, requestId, path: req.path, stack: err.stack }, 'Unhandled error');

  const problemDetail: RFC7807ProblemDetail = {
    type: `${ERROR_TYPE_BASE}internal-error`,
    title: 'Internal Server Error',
    status: 500,
    detail: process.env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
    instance: req.originalUrl,
    traceId: requestId,
    timestamp: new Date().toISOString(),
  };

  res.status(500).json(problemDetail);
}

export function asyncHandler<T extends Request = Request>(
  fn: (req: T, res: Response, next: NextFunction) => Promise<void>
): (req: T, res: Response, next: NextFunction) => void {
  return (req: T, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  const problemDetail: RFC7807ProblemDetail = {
    type: `${ERROR_TYPE_BASE}not-found`,
    title: 'Not Found',
    status: 404,
    detail: `Route ${req.method} ${req.path} not found`,
    instance: req.originalUrl,
    timestamp: new Date().toISOString(),
  };
  res.status(404).json(problemDetail);
}
