export { registerApiKey } from './apiKey';
export { registerErrorHandler } from './errorHandler';
export { registerMetrics } from './metrics';
export { registerRequestId, resolveRequestId, REQUEST_ID_HEADER } from './requestId';
