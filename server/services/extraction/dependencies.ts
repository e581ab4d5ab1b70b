import type { AppConfig } from '../../config';
import { ClaudeVisionAdapter } from './adapters/claude-vision';
import type { RecognitionAdapter } from './adapters/types';
import { ExtractionClient } from './extraction-client';
import { FormatNormalizer } from './format-normalizer';
import type { RenderToolkitLoader } from './page-renderer';

export interface ExtractionDependencies {
  normalizer: FormatNormalizer;
  extractor: ExtractionClient;
}

export interface ExtractionOverrides {
  adapter?: RecognitionAdapter;
  loadToolkit?: RenderToolkitLoader;
}

export function createExtractionDependencies(
  appConfig: AppConfig,
  overrides: ExtractionOverrides = {}
): ExtractionDependencies {
  const adapter = overrides.adapter ?? new ClaudeVisionAdapter({
    apiKey: appConfig.ANTHROPIC_API_KEY,
    model: appConfig.RECOGNITION_MODEL,
  });

  return {
    normalizer: new FormatNormalizer({
      maxImageEdge: appConfig.MAX_IMAGE_EDGE,
      pdfRenderScale: appConfig.PDF_RENDER_SCALE,
      maxUploadBytes: appConfig.MAX_UPLOAD_BYTES,
      loadToolkit: overrides.loadToolkit,
    }),
    extractor: new ExtractionClient(adapter, {
      timeoutMs: appConfig.RECOGNITION_TIMEOUT_MS,
      maxAttempts: appConfig.RECOGNITION_MAX_ATTEMPTS,
      initialDelayMs: appConfig.RECOGNITION_RETRY_DELAY_MS,
    }),
  };
}
