import createError from '@fastify/error';

// Deployment collaborator errors (DEPLOY_*)

/** A plan or instance name cannot be used as a path segment (400) */
export const DeployUnsafeNameError = createError<[string, string]>(
  'DEPLOY_UNSAFE_NAME',
  'Unsafe %s name: %s',
  400
);

/** Instance applied through a plan that was never registered (500) */
export const DeployPlanNotRegisteredError = createError<[string]>(
  'DEPLOY_PLAN_NOT_REGISTERED',
  'Deployment plan not registered: %s',
  500
);
