/**
 * Tutoring Service Application
 * Main Express app setup
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import timeout from 'connect-timeout';
import helmet from 'helmet';
import compression from 'compression';
import logger, { describeError } from '@tutoriapp/shared/config/logger';
import { createHealthCheckEndpoints } from '@tutoriapp/shared/middlewares/healthChecks';
import { globalErrorHandler } from '@tutoriapp/shared/middlewares/globalErrorHandler';
import { requestLogger } from '@tutoriapp/shared/middlewares/requestLogger';
import type { DatabaseRuntime } from '@tutoriapp/shared/databases/postgres/runtime';
import { errorResponse } from '@tutoriapp/shared/utils/responseBuilder';
import type { TokenSettings } from '@tutoriapp/shared/utils/tokenManager';
import { createAuthMiddleware } from './middlewares/authMiddleware';
import { UserService } from './services/user.service';
import { CourseService } from './services/course.service';
import { SessionService } from './services/session.service';
import { AuthService } from './services/auth.service';
import { UserController } from './controllers/user.controller';
import { CourseController } from './controllers/course.controller';
import { SessionController } from './controllers/session.controller';
import { AuthController } from './controllers/auth.controller';
import { createAuthRoutes } from './routes/auth.routes';
import { createUserRoutes } from './routes/user.routes';
import { createCourseRoutes } from './routes/course.routes';
import { createSessionRoutes } from './routes/session.routes';

export const SERVICE_NAME = 'tutoring-service';

export interface AppOptions {
  database: DatabaseRuntime;
  tokens: TokenSettings;
  saltRounds?: number;
}

// Paths that must answer even while the database is down
const SKIP_DATABASE_INIT = new Set(['/api', '/api/', '/api/health', '/api/ready']);

export function createApp({ database, tokens, saltRounds }: AppOptions): Express {
  const app: Express = express();

  // Security & performance middlewares
  app.use(helmet());
  app.use(compression());

  // Request timeout middleware (30 seconds)
  app.use(timeout('30s'));

  // Timeout handler - must be after timeout middleware
  app.use((req, _res, next) => {
    if (!req.timedout) next();
  });

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  // The runtime is normally initialized at startup; this covers a request that arrives first
  app.use(async (req: Request, res: Response, next: NextFunction) => {
    if (database.isInitialized || SKIP_DATABASE_INIT.has(req.path)) {
      return next();
    }
    try {
      await database.init();
      next();
    } catch (error) {
      logger.error('Database initialization failed', { service: SERVICE_NAME, error: describeError(error) });
      errorResponse(res, { statusCode: 503, message: 'Database temporarily unavailable' });
    }
  });

  const users = new UserService(database, { saltRounds });
  const courses = new CourseService(database);
  const sessions = new SessionService(database);
  const auth = new AuthService(database, users, tokens);
  const authMiddleware = createAuthMiddleware(tokens.secret);

  const { healthHandler, readyHandler } = createHealthCheckEndpoints({ serviceName: SERVICE_NAME, database });

  const api = express.Router();

  api.get('/', (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      status: 'ok',
      endpoints: ['/api/login', '/api/register', '/api/users', '/api/courses', '/api/sessions'],
    });
  });
  api.get('/health', healthHandler);
  api.get('/ready', readyHandler);

  api.use(createAuthRoutes(new AuthController(auth)));
  api.use('/users', createUserRoutes(new UserController(users), authMiddleware));
  api.use('/courses', createCourseRoutes(new CourseController(courses), authMiddleware));
  api.use('/sessions', createSessionRoutes(new SessionController(sessions), authMiddleware));

  app.use('/api', api);

  app.use((_req, res) => {
    errorResponse(res, { statusCode: 404, message: 'Route not found' });
  });

  // Error handler (must be last)
  app.use(globalErrorHandler);

  return app;
}
