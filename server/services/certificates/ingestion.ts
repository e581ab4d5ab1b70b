import type { CertificateRecord } from '@shared/schema';
import type { CertificateFieldName, CertificateFields } from '@shared/certificate-fields';
import { ExtractionError, InternalServerError } from '../../errors';
import { ingestionLogger } from '../../logger';
import type { FileStore, PersistenceGateway } from '../../storage/interfaces';
import type { ExtractionClient } from '../extraction/extraction-client';
import { assertUploadSize, resolveSourceFormat, type FormatNormalizer } from '../extraction/format-normalizer';
import type { ExtractionResult } from '../extraction/types';
import { authorityFor, reconcile } from './field-reconciler';
import type { SubmissionService } from './submission-service';
import { toStateError, transition, type TransitionContext } from './submission-state';

export interface IngestionDeps {
  gateway: PersistenceGateway;
  files: FileStore;
  submissions: SubmissionService;
  normalizer: Pick<FormatNormalizer, 'normalize'>;
  extractor: Pick<ExtractionClient, 'extract'>;
  maxUploadBytes: number;
}

interface WrittenRows {
  fileRow: boolean;
  certId?: string;
}

export interface IngestOptions {
  originalName?: string;
  signal?: AbortSignal;
}

export interface IngestResult {
  record: CertificateRecord;
  missingRequired: CertificateFieldName[];
  suggestions: Partial<CertificateFields>;
  notes: string[];
  extraction: Omit<ExtractionResult, 'fields'>;
}

/**
 * The upload boundary: raw bytes in, a draft certificate out. Nothing is
 * stored until extraction has succeeded and the deadline has been re-read;
 * a failure after that removes everything the upload wrote.
 */
export class IngestionService {
  constructor(private readonly deps: IngestionDeps) {}

  async ingest(
    rawBytes: Buffer,
    declaredType: string,
    accountId: string,
    options: IngestOptions = {}
  ): Promise<IngestResult> {
    const { gateway, files, submissions } = this.deps;
    const log = ingestionLogger.child({ accountId, declaredType, byteSize: rawBytes.length });

    const identity = await submissions.resolveIdentity(accountId);
    authorityFor(identity.role);
    assertUploadSize(rawBytes.length, this.deps.maxUploadBytes);
    this.checkCreate(await submissions.transitionContext());

    const image = await this.deps.normalizer.normalize(rawBytes, declaredType);
    log.debug({ width: image.width, height: image.height, pageCount: image.source.pageCount }, 'Upload normalised');

    const extraction = await this.deps.extractor.extract(image, { signal: options.signal });
    if (extraction.failure) {
      throw new ExtractionError(extraction.failure.code, extraction.failure.reason, {
        attempts: extraction.attempts,
        provider: extraction.provider,
      });
    }
    if (options.signal?.aborted) {
      throw new ExtractionError('CANCELLED', 'The upload was abandoned before it was stored', {
        attempts: extraction.attempts,
        provider: extraction.provider,
      });
    }

    const fileId = crypto.randomUUID();
    const extension = resolveSourceFormat(declaredType) ?? 'bin';
    const storageKey = `${identity.accountId}/${fileId}.${extension}`;

    const context = await submissions.transitionContext();
    this.checkCreate(context);

    const storedPath = await files.save(storageKey, rawBytes);
    const written: WrittenRows = { fileRow: false };

    try {
      await gateway.createUploadedFile({
        fileId,
        ownerAccountId: identity.accountId,
        originalName: options.originalName ?? `upload.${extension}`,
        storedPath,
        mimeOrExtension: declaredType,
        byteSize: rawBytes.length,
      });
      written.fileRow = true;

      const reconciled = reconcile({ extraction, identity, file: { fileId, storedPath } });

      const certId = await gateway.createCertificate({
        ...reconciled.draft,
        createdAt: context.now,
        submittedAt: null,
      });
      written.certId = certId;
      const record = await gateway.getCertificate(certId);
      if (!record) {
        throw new InternalServerError(`Certificate ${certId} was not readable after creation`);
      }

      log.info({
        certId,
        extractionStatus: extraction.status,
        confidence: extraction.confidence,
        missingRequired: reconciled.missingRequired,
      }, 'Certificate draft created');

      const { fields: _fields, ...extractionSummary } = extraction;
      return {
        record,
        missingRequired: reconciled.missingRequired,
        suggestions: reconciled.suggestions,
        notes: [...extraction.notes, ...reconciled.notes],
        extraction: extractionSummary,
      };
    } catch (error) {
      await this.rollback(fileId, storageKey, written, log);
      throw error;
    }
  }

  private checkCreate(context: TransitionContext): void {
    const result = transition(null, { type: 'create' }, context);
    if (!result.ok) {
      throw toStateError(result.rejection);
    }
  }

  /** Undoes whatever this upload wrote, newest first. Cleanup failures are logged; the original error still propagates. */
  private async rollback(
    fileId: string,
    storageKey: string,
    written: WrittenRows,
    log: typeof ingestionLogger
  ): Promise<void> {
    const { gateway, files } = this.deps;
    const steps: Array<[string, () => Promise<unknown>]> = [];
    const certId = written.certId;
    if (certId) steps.push(['certificate', () => gateway.deleteCertificate(certId)]);
    if (written.fileRow) steps.push(['uploaded file record', () => gateway.deleteUploadedFile(fileId)]);
    steps.push(['stored upload', () => files.remove(storageKey)]);

    for (const [what, undo] of steps) {
      try {
        await undo();
      } catch (cleanupError) {
        log.error({ err: cleanupError, fileId, storageKey, certId }, `Failed to remove ${what} after ingestion error`);
      }
    }
  }
}
