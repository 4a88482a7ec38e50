export {
  CloudRegistrar,
  DEFAULT_MESSAGE_EXPIRY_SECONDS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  NOTIFY_MIME_TYPE,
} from './registrar.js';
export type { CloudRegistrarOptions, FetchLike, RegistrationCollaborator } from './registrar.js';

export {
  CredentialsError,
  RegistrationConfigSchema,
  DEFAULT_CREDENTIALS_PATH,
  DEFAULT_CREDENTIALS_READ_ATTEMPTS,
  DEFAULT_CREDENTIALS_READ_BACKOFF_MS,
  loadRegistrationConfig,
  parseRegistrationConfig,
  parseSettings,
} from './credentials.js';
export type { LoadCredentialsOptions, RegistrationConfig } from './credentials.js';
