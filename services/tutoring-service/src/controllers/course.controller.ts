/**
 * Course Controller - HTTP Request Handlers
 */

import { Request, Response } from 'express';
import { asyncHandler } from '@tutoriapp/shared/utils/asyncHandler';
import { errorResponse, successResponse } from '@tutoriapp/shared/utils/responseBuilder';
import { CourseService } from '../services/course.service';
import { idParamsSchema, statusFlagSchema } from '../schemas/common.schema';
import { createCourseSchema, listCoursesQuerySchema, updateCourseSchema } from '../schemas/course.schema';

export class CourseController {
  constructor(private courseService: CourseService) {}

  /**
   * GET /api/courses
   */
  getCourses = asyncHandler(async (req: Request, res: Response) => {
    const filters = listCoursesQuerySchema.parse(req.query);
    const courses = await this.courseService.findMany(filters);
    return successResponse(res, {
      message: 'Courses retrieved successfully',
      data: courses,
    });
  });

  /**
   * GET /api/courses/:id
   */
  getCourseById = asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamsSchema.parse(req.params);
    const course = await this.courseService.findOne(id);
    if (!course) {
      return errorResponse(res, { statusCode: 404, message: 'Course not found' });
    }
    return successResponse(res, {
      message: 'Course retrieved successfully',
      data: course,
    });
  });

  /**
   * POST /api/courses
   */
  createCourse = asyncHandler(async (req: Request, res: Response) => {
    const body = createCourseSchema.parse(req.body);
    const course = await this.courseService.create(body);
    return successResponse(res, {
      statusCode: 201,
      message: 'Course created successfully',
      data: course,
    });
  });

  /**
   * PUT /api/courses/:id
   */
  updateCourse = asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamsSchema.parse(req.params);
    const body = updateCourseSchema.parse(req.body);
    const course = await this.courseService.update(id, body);
    if (!course) {
      return errorResponse(res, { statusCode: 404, message: 'Course not found' });
    }
    return successResponse(res, {
      message: 'Course updated successfully',
      data: course,
    });
  });

  /**
   * PATCH /api/courses/:id/status
   */
  updateCourseStatus = asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamsSchema.parse(req.params);
    const { status } = statusFlagSchema.parse(req.body);
    const course = await this.courseService.updateStatus(id, status);
    if (!course) {
      return errorResponse(res, { statusCode: 404, message: 'Course not found' });
    }
    return successResponse(res, {
      message: 'Course status updated successfully',
      data: course,
    });
  });
}
