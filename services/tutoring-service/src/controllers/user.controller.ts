/**
 * User Controller - HTTP Request Handlers
 */

import { Request, Response } from 'express';
import { asyncHandler } from '@tutoriapp/shared/utils/asyncHandler';
import { errorResponse, successResponse } from '@tutoriapp/shared/utils/responseBuilder';
import { UserService } from '../services/user.service';
import { idParamsSchema, statusFlagSchema } from '../schemas/common.schema';
import {
  createUserSchema,
  listUsersQuerySchema,
  sessionIdParamsSchema,
  studentsBySessionQuerySchema,
  updateUserSchema,
} from '../schemas/user.schema';

export class UserController {
  constructor(private userService: UserService) {}

  /**
   * GET /api/users
   */
  getUsers = asyncHandler(async (req: Request, res: Response) => {
    const filters = listUsersQuerySchema.parse(req.query);
    const users = await this.userService.findMany(filters);
    return successResponse(res, {
      message: 'Users retrieved successfully',
      data: users,
    });
  });

  /**
   * GET /api/users/:id
   */
  getUserById = asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamsSchema.parse(req.params);
    const user = await this.userService.findOne(id);
    if (!user) {
      return errorResponse(res, { statusCode: 404, message: 'User not found' });
    }
    return successResponse(res, {
      message: 'User retrieved successfully',
      data: user,
    });
  });

  /**
   * POST /api/users
   */
  createUser = asyncHandler(async (req: Request, res: Response) => {
    const body = createUserSchema.parse(req.body);
    const user = await this.userService.create(body);
    return successResponse(res, {
      statusCode: 201,
      message: 'User created successfully',
      data: user,
    });
  });

  /**
   * PUT /api/users/:id
   */
  updateUser = asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamsSchema.parse(req.params);
    const body = updateUserSchema.parse(req.body);
    const user = await this.userService.update(id, body);
    if (!user) {
      return errorResponse(res, { statusCode: 404, message: 'User not found' });
    }
    return successResponse(res, {
      message: 'User updated successfully',
      data: user,
    });
  });

  /**
   * PATCH /api/users/:id/status
   */
  updateUserStatus = asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamsSchema.parse(req.params);
    const { status } = statusFlagSchema.parse(req.body);
    const user = await this.userService.updateStatus(id, status);
    if (!user) {
      return errorResponse(res, { statusCode: 404, message: 'User not found' });
    }
    return successResponse(res, {
      message: 'User status updated successfully',
      data: user,
    });
  });

  /**
   * GET /api/users/:sessionId/students-by-session
   */
  getStudentsBySession = asyncHandler(async (req: Request, res: Response) => {
    const { sessionId } = sessionIdParamsSchema.parse(req.params);
    const filters = studentsBySessionQuerySchema.parse(req.query);
    const students = await this.userService.findManyBySessionId(sessionId, filters);
    return successResponse(res, {
      message: 'Students retrieved successfully',
      data: students,
    });
  });
}
