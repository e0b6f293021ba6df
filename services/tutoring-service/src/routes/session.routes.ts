/**
 * Session Routes
 */

import { Router } from 'express';
import { SessionController } from '../controllers/session.controller';
import type { AuthMiddleware } from '../middlewares/authMiddleware';

export function createSessionRoutes(sessionController: SessionController, auth: AuthMiddleware): Router {
  const router = Router();

  router.use(auth.requireAuth);

  // Dashboards and per-person lists (before /:id)
  router.get('/tutor/:tutorId', sessionController.getTutorSessions);
  router.get('/tutor/:tutorId/stats', sessionController.getTutorStats);
  router.get('/student/:studentId', sessionController.getStudentSessions);
  router.get('/student/:studentId/stats', sessionController.getStudentStats);
  router.get('/student/:studentId/stats/history', sessionController.getStudentStatsHistory);

  router.get('/', sessionController.getSessions);
  router.post('/', sessionController.createSession);
  router.get('/:id', sessionController.getSessionById);
  router.patch('/:id/status', sessionController.updateSessionStatus);

  // Enrollments
  router.post('/:id/students', sessionController.enrollStudent);
  router.patch('/:id/students/:studentId/status', sessionController.updateStudentStatus);

  return router;
}
