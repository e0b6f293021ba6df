/**
 * Session Controller - HTTP Request Handlers
 */

import { Request, Response } from 'express';
import { asyncHandler } from '@tutoriapp/shared/utils/asyncHandler';
import { errorResponse, successResponse } from '@tutoriapp/shared/utils/responseBuilder';
import { SessionService, type EnrollmentResult } from '../services/session.service';
import type { SessionFilters } from '../models/session.model';
import { idParamsSchema } from '../schemas/common.schema';
import {
  createSessionSchema,
  enrollmentParamsSchema,
  enrollmentStatusSchema,
  enrollStudentSchema,
  listSessionsQuerySchema,
  sessionFiltersQuerySchema,
  sessionStatusSchema,
  studentParamsSchema,
  tutorParamsSchema,
} from '../schemas/session.schema';
import { toDateRange } from '../utils/dateFilters';

type EnrollmentFailure = Extract<EnrollmentResult, { ok: false }>['reason'];

export const ENROLLMENT_FAILURES: Record<EnrollmentFailure, { statusCode: number; message: string }> = {
  session_not_found: { statusCode: 404, message: 'Session not found' },
  student_not_found: { statusCode: 404, message: 'Student not found' },
  already_enrolled: { statusCode: 409, message: 'Student is already enrolled in this session' },
};

function parseSessionFilters(query: unknown): SessionFilters {
  const { start_date, end_date, ...rest } = sessionFiltersQuerySchema.parse(query);
  return { ...rest, ...toDateRange(start_date, end_date) };
}

export class SessionController {
  constructor(private sessionService: SessionService) {}

  /**
   * GET /api/sessions
   */
  getSessions = asyncHandler(async (req: Request, res: Response) => {
    const { start_date, end_date, exclude_user_id, ...rest } = listSessionsQuerySchema.parse(req.query);
    const sessions = await this.sessionService.findMany({
      ...rest,
      ...toDateRange(start_date, end_date),
      excludeUserId: exclude_user_id,
    });
    return successResponse(res, {
      message: 'Sessions retrieved successfully',
      data: sessions,
    });
  });

  /**
   * GET /api/sessions/:id
   */
  getSessionById = asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamsSchema.parse(req.params);
    const session = await this.sessionService.findOne(id);
    if (!session) {
      return errorResponse(res, { statusCode: 404, message: 'Session not found' });
    }
    return successResponse(res, {
      message: 'Session retrieved successfully',
      data: session,
    });
  });

  /**
   * GET /api/sessions/tutor/:tutorId
   */
  getTutorSessions = asyncHandler(async (req: Request, res: Response) => {
    const { tutorId } = tutorParamsSchema.parse(req.params);
    const sessions = await this.sessionService.findManyByTutorId(tutorId, parseSessionFilters(req.query));
    return successResponse(res, {
      message: 'Tutor sessions retrieved successfully',
      data: sessions,
    });
  });

  /**
   * GET /api/sessions/tutor/:tutorId/stats
   */
  getTutorStats = asyncHandler(async (req: Request, res: Response) => {
    const { tutorId } = tutorParamsSchema.parse(req.params);
    const stats = await this.sessionService.getTutorStats(tutorId);
    return successResponse(res, {
      message: 'Tutor statistics retrieved successfully',
      data: stats,
    });
  });

  /**
   * GET /api/sessions/student/:studentId
   */
  getStudentSessions = asyncHandler(async (req: Request, res: Response) => {
    const { studentId } = studentParamsSchema.parse(req.params);
    const sessions = await this.sessionService.findManyByStudentId(studentId, parseSessionFilters(req.query));
    return successResponse(res, {
      message: 'Student sessions retrieved successfully',
      data: sessions,
    });
  });

  /**
   * GET /api/sessions/student/:studentId/stats
   */
  getStudentStats = asyncHandler(async (req: Request, res: Response) => {
    const { studentId } = studentParamsSchema.parse(req.params);
    const stats = await this.sessionService.getStudentStats(studentId);
    return successResponse(res, {
      message: 'Student statistics retrieved successfully',
      data: stats,
    });
  });

  /**
   * GET /api/sessions/student/:studentId/stats/history
   */
  getStudentStatsHistory = asyncHandler(async (req: Request, res: Response) => {
    const { studentId } = studentParamsSchema.parse(req.params);
    const stats = await this.sessionService.getStudentStatsHistory(studentId);
    return successResponse(res, {
      message: 'Student history retrieved successfully',
      data: stats,
    });
  });

  /**
   * POST /api/sessions
   */
  createSession = asyncHandler(async (req: Request, res: Response) => {
    const body = createSessionSchema.parse(req.body);
    const session = await this.sessionService.create(body);
    return successResponse(res, {
      statusCode: 201,
      message: 'Session created successfully',
      data: session,
    });
  });

  /**
   * PATCH /api/sessions/:id/status
   */
  updateSessionStatus = asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamsSchema.parse(req.params);
    const { status } = sessionStatusSchema.parse(req.body);
    const session = await this.sessionService.updateStatus(id, status);
    if (!session) {
      return errorResponse(res, { statusCode: 404, message: 'Session not found' });
    }
    return successResponse(res, {
      message: 'Session status updated successfully',
      data: session,
    });
  });

  /**
   * POST /api/sessions/:id/students
   */
  enrollStudent = asyncHandler(async (req: Request, res: Response) => {
    const { id } = idParamsSchema.parse(req.params);
    const body = enrollStudentSchema.parse(req.body);
    const result = await this.sessionService.enrollStudent({ ...body, sessionId: id });
    if (!result.ok) {
      return errorResponse(res, ENROLLMENT_FAILURES[result.reason]);
    }
    return successResponse(res, {
      statusCode: 201,
      message: 'Student enrolled successfully',
      data: result.enrollment,
    });
  });

  /**
   * PATCH /api/sessions/:id/students/:studentId/status
   */
  updateStudentStatus = asyncHandler(async (req: Request, res: Response) => {
    const { id, studentId } = enrollmentParamsSchema.parse(req.params);
    const { status, attended } = enrollmentStatusSchema.parse(req.body);
    const enrollment = await this.sessionService.updateStudentStatus(id, studentId, status, attended);
    if (!enrollment) {
      return errorResponse(res, { statusCode: 404, message: 'Enrollment not found' });
    }
    return successResponse(res, {
      message: 'Enrollment updated successfully',
      data: enrollment,
    });
  });
}
