/**
 * Auth Controller - login and self-service sign-up
 */

import { Request, Response } from 'express';
import { asyncHandler } from '@tutoriapp/shared/utils/asyncHandler';
import { errorResponse, successResponse } from '@tutoriapp/shared/utils/responseBuilder';
import { AuthService } from '../services/auth.service';
import { loginSchema, registerSchema } from '../schemas/auth.schema';

export class AuthController {
  constructor(private authService: AuthService) {}

  /**
   * POST /api/login
   */
  login = asyncHandler(async (req: Request, res: Response) => {
    const { email, password } = loginSchema.parse(req.body);
    const result = await this.authService.login(email, password);
    if (!result) {
      return errorResponse(res, { statusCode: 401, message: 'Invalid email or password' });
    }
    return successResponse(res, {
      message: 'Login successful',
      data: result,
    });
  });

  /**
   * POST /api/register
   */
  register = asyncHandler(async (req: Request, res: Response) => {
    const body = registerSchema.parse(req.body);
    const user = await this.authService.register(body);
    return successResponse(res, {
      statusCode: 201,
      message: 'User registered successfully',
      data: user,
    });
  });
}
