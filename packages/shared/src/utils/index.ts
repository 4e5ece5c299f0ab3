export { isoNow, epochSeconds } from './clock.js';
export { createLogger } from './logger.js';
export type { Logger, LogSink } from './logger.js';
export { toValidationIssues, parseOrThrow } from './validation.js';
export {
  TallyError,
  ValidationError,
  InvalidFilterFormatError,
  DuplicateUsernameError,
  AuthenticationError,
  InvalidCredentialsError,
  InvalidTokenError,
  UnknownSubjectError,
  InactiveUserError,
  NotFoundError,
  ConfigError,
} from './errors.js';
export type { IssueLocation, ValidationIssue } from './errors.js';
