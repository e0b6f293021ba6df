/**
 * Course Routes
 */

import { Router } from 'express';
import { CourseController } from '../controllers/course.controller';
import type { AuthMiddleware } from '../middlewares/authMiddleware';

export function createCourseRoutes(courseController: CourseController, auth: AuthMiddleware): Router {
  const router = Router();
  const requireAdmin = auth.requireRole('admin');

  router.use(auth.requireAuth);

  // Course CRUD
  router.post('/', requireAdmin, courseController.createCourse);
  router.get('/', courseController.getCourses);
  router.get('/:id', courseController.getCourseById);
  router.put('/:id', requireAdmin, courseController.updateCourse);
  router.patch('/:id/status', requireAdmin, courseController.updateCourseStatus);

  return router;
}
