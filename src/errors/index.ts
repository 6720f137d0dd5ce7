export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  CredentialRequestFailedError,
  InvalidEnvironError,
  CommandFailedError,
  CommandFailure,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError, appErrorDetails } from './formatter.js';
