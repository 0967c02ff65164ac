export { registerCors } from './cors';
export { registerErrorHandler } from './errorHandler';
export { registerJwt } from './jwt';
export { registerMetrics } from './metrics';
export { registerRequestId } from './requestId';
export { registerRbac, hasRole, isAdmin } from './rbac';
