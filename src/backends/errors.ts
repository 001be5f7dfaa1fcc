import createError from '@fastify/error';

// Backend registry and contract errors (BACKEND_*)

/** Another backend already registered this type identifier (409) */
export const DuplicateBackendTypeError = createError<[string]>(
  'BACKEND_DUPLICATE_TYPE',
  'Backend type already registered: %s',
  409
);

/** Another backend already uses this deployable unit name (409) */
export const DuplicateDeployableUnitError = createError<[string, string]>(
  'BACKEND_DUPLICATE_UNIT',
  'Deployable unit %s already registered by backend %s',
  409
);

export const BackendNotFoundError = createError<[string]>(
  'BACKEND_NOT_FOUND',
  'Unknown backend type: %s',
  404
);

/** Descriptor fails the registration checks (500 -- a programming error) */
export const BackendDescriptorInvalidError = createError<[string, string]>(
  'BACKEND_DESCRIPTOR_INVALID',
  'Invalid descriptor for backend %s: %s',
  500
);

export const InstanceNameInvalidError = createError<[string]>(
  'BACKEND_INSTANCE_NAME_INVALID',
  'Invalid backend instance name: %s',
  400
);

/** A config validated by one backend's schema was handed to another backend */
export const ConfigMismatchError = createError<[string, string]>(
  'BACKEND_CONFIG_MISMATCH',
  'Configuration validated for %s cannot be used with backend %s',
  400
);

/** Secret values are set but no secret reference was supplied */
export const SecretReferenceMissingError = createError<[string]>(
  'BACKEND_SECRET_REFERENCE_MISSING',
  'Backend %s has secret values but no secret reference',
  500
);
