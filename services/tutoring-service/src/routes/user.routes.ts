/**
 * User Routes
 */

import { Router } from 'express';
import { UserController } from '../controllers/user.controller';
import type { AuthMiddleware } from '../middlewares/authMiddleware';

export function createUserRoutes(userController: UserController, auth: AuthMiddleware): Router {
  const router = Router();
  const requireAdmin = auth.requireRole('admin');

  router.use(auth.requireAuth);

  router.get('/', userController.getUsers);
  router.get('/:sessionId/students-by-session', userController.getStudentsBySession);
  router.get('/:id', userController.getUserById);
  router.post('/', requireAdmin, userController.createUser);
  router.put('/:id', requireAdmin, userController.updateUser);
  router.patch('/:id/status', requireAdmin, userController.updateUserStatus);

  return router;
}
