export { HttpSourceClient } from './client.js';
export type { HttpSourceClientConfig } from './client.js';

export { decodeRecords, payloadSchema, recordArraySchema, overpassEnvelopeSchema } from './payload.js';
export type { SourcePayload } from './payload.js';

export {
  Extractor,
  createExtractor,
  isRetryableFetchError,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_MAX_RETRY_DELAY_MS,
} from './extractor.js';
export type { ExtractorConfig, ExtractorBackoff } from './extractor.js';
