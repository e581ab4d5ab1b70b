import type { AppConfig } from '../../config';
import type { StorageBundle } from '../../storage';
import { createExtractionDependencies, type ExtractionOverrides } from '../extraction/dependencies';
import { IngestionService } from './ingestion';
import { SubmissionService } from './submission-service';

export interface IntakeServices {
  ingestion: IngestionService;
  submissions: SubmissionService;
}

export function createIntakeServices(
  appConfig: AppConfig,
  storage: StorageBundle,
  overrides: ExtractionOverrides & { now?: () => Date } = {}
): IntakeServices {
  const { normalizer, extractor } = createExtractionDependencies(appConfig, overrides);
  const submissions = new SubmissionService({
    gateway: storage.gateway,
    identities: storage.identities,
    now: overrides.now,
  });
  const ingestion = new IngestionService({
    gateway: storage.gateway,
    files: storage.files,
    submissions,
    normalizer,
    extractor,
    maxUploadBytes: appConfig.MAX_UPLOAD_BYTES,
  });
  return { ingestion, submissions };
}
