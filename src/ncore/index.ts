export { SourceClient, DEFAULT_TIMEOUT_MS } from './source-client';
export type { Credentials, SourceClientOptions } from './source-client';
export {
  extractProfile,
  extractSeedingCount,
  parseInteger,
  emptySnapshot,
  FIELD_SETTERS,
  LABEL_SELECTOR,
  SEEDING_HEADER_SELECTOR,
} from './field-extractor';
