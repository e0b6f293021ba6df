/**
 * Shared Package - Main Export
 * Central export point for configuration, logging, middlewares and the PostgreSQL runtime
 */

// Config (loads .env on import)
export * from './config';
export {
	describeError,
	logServiceStart,
	logServiceStop,
	logApiRequest,
	logApiError,
	logDatabaseOperation,
	logAuthEvent,
	type DatabaseLogger,
} from './config/logger';

// Database
export * from './databases/index';

// Middlewares
export * from './middlewares/healthChecks';
export { requestLogger } from './middlewares/requestLogger';
export { globalErrorHandler } from './middlewares/globalErrorHandler';

// Utils
export * from './utils/asyncHandler';
export * from './utils/asyncMutex';
export * from './utils/responseBuilder';
export * from './utils/tokenManager';
export * from './utils/typeGuards';
