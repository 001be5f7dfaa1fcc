import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Server errors (SERVER_*)
export const ServerStartError = createError<[string]>(
  'SERVER_START_ERROR',
  'Failed to start server: %s',
  500
);

// Backend errors (BACKEND_*) - re-exported from backends domain
export {
  BackendDescriptorInvalidError,
  BackendNotFoundError,
  ConfigMismatchError,
  DuplicateBackendTypeError,
  DuplicateDeployableUnitError,
  InstanceNameInvalidError,
  SecretReferenceMissingError,
} from '../backends/errors.js';

// Schema errors (SCHEMA_*, CONFIG_VALIDATION_*) - re-exported from schema domain
export {
  ConfigNotValidatedError,
  ConfigValidationError,
  SchemaDefinitionError,
} from '../schema/errors.js';

// Deployment errors (DEPLOY_*) - re-exported from deploy domain
export { DeployPlanNotRegisteredError, DeployUnsafeNameError } from '../deploy/errors.js';
