import type { CertificateFieldName } from '@shared/certificate-fields';
import type { CertificateStatus } from '@shared/schema';
import { StateError, type StateErrorCode } from '../../errors';

export type SubmissionCommand =
  | { type: 'create' }
  | { type: 'save' }
  | { type: 'edit' }
  | { type: 'submit'; missingRequired: readonly CertificateFieldName[] }
  | { type: 'discard' }
  | { type: 'adminDelete' };

/** `null` means no record exists (before create, after delete). */
export type SubmissionState = CertificateStatus | null;

export interface TransitionContext {
  now: Date;
  deadline: Date | null;
}

export interface StateRejection {
  code: StateErrorCode;
  message: string;
  state: SubmissionState;
  deadline: Date | null;
  fields: CertificateFieldName[];
}

export type TransitionResult =
  | { ok: true; next: SubmissionState; submittedAt?: Date }
  | { ok: false; rejection: StateRejection };

export function isDeadlinePassed(now: Date, deadline: Date | null): boolean {
  return deadline !== null && now.getTime() > deadline.getTime();
}

function reject(
  code: StateErrorCode,
  message: string,
  state: SubmissionState,
  context: TransitionContext,
  fields: readonly CertificateFieldName[] = []
): TransitionResult {
  return { ok: false, rejection: { code, message, state, deadline: context.deadline, fields: [...fields] } };
}

function deadlineRejection(state: SubmissionState, context: TransitionContext): TransitionResult {
  const deadline = context.deadline ? context.deadline.toISOString() : 'unset';
  return reject('DEADLINE_PASSED', `The submission deadline (${deadline}) has passed`, state, context);
}

/**
 * The draft/submitted lifecycle. Pure: the caller supplies the current time
 * and the deadline it just read, and applies the returned state itself.
 */
export function transition(
  state: SubmissionState,
  command: SubmissionCommand,
  context: TransitionContext
): TransitionResult {
  const pastDeadline = isDeadlinePassed(context.now, context.deadline);

  switch (command.type) {
    case 'adminDelete':
      if (state === null) {
        return reject('INVALID_TRANSITION', 'There is no certificate to delete', state, context);
      }
      return { ok: true, next: null };

    case 'create':
      if (state !== null) {
        return reject('INVALID_TRANSITION', 'The certificate already exists', state, context);
      }
      if (pastDeadline) return deadlineRejection(state, context);
      return { ok: true, next: 'draft' };

    case 'save':
    case 'edit':
    case 'discard':
      if (state === null) {
        return reject('INVALID_TRANSITION', `Cannot ${command.type} a certificate that does not exist`, state, context);
      }
      if (state === 'submitted') {
        return reject('RECORD_IMMUTABLE', 'Submitted certificates can no longer be changed', state, context);
      }
      if (pastDeadline) return deadlineRejection(state, context);
      return { ok: true, next: command.type === 'discard' ? null : 'draft' };

    case 'submit':
      if (state === null) {
        return reject('INVALID_TRANSITION', 'Cannot submit a certificate that does not exist', state, context);
      }
      if (state === 'submitted') {
        return reject('CONFLICT', 'The certificate has already been submitted', state, context);
      }
      if (pastDeadline) return deadlineRejection(state, context);
      if (command.missingRequired.length > 0) {
        return reject(
          'MISSING_REQUIRED_FIELDS',
          `Required fields are missing: ${command.missingRequired.join(', ')}`,
          state,
          context,
          command.missingRequired
        );
      }
      return { ok: true, next: 'submitted', submittedAt: context.now };
  }
}

export function toStateError(rejection: StateRejection): StateError {
  return new StateError(rejection.code, rejection.message, {
    fields: rejection.fields,
    currentStatus: rejection.state,
    deadline: rejection.deadline,
  });
}
