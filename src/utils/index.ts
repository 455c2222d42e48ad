export { logger, isLogLevel } from './logger';
export type { LogLevel } from './logger';
export type { SourceFailure } from './errors';
export {
  TrackerError,
  ConfigurationError,
  SourceFetchError,
  StorageError,
  ConflictError,
  ValidationError,
  ErrorCode,
  errorMessage,
  pgErrorCode,
  handleError,
  isTrackerError,
} from './errors';
export {
  HealthChecker,
  createDatabaseHealthCheck,
  createSchedulerHealthCheck,
} from './health-checker';
export type { ComponentHealth, SystemHealth, HealthStatus } from './health-checker';
export {
  validateQuery,
  formatIssues,
  historyQuerySchema,
  accountSpecSchema,
} from './validation';
export type { HistoryQuery, AccountSpec, FieldIssue } from './validation';
