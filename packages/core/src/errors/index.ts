export {
  ConfigError,
  MissingRequiredFieldError,
  TypeCoercionError,
  ValidationError,
  ConfigurationConflictError,
  wrapError,
} from './config-error.js';
export type { ConfigErrorCode, ConfigErrorDetails } from './config-error.js';
