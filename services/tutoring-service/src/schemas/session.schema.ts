import { z } from 'zod';
import { ENROLLMENT_STATUSES } from '../models/user.model';
import { SESSION_LEVELS, SESSION_STATUSES, SESSION_TYPES } from '../models/session.model';
import { dateQueryParam, idParam, searchParam } from './common.schema';

export const sessionFiltersQuerySchema = z.object({
  search: searchParam(),
  level: z.enum(SESSION_LEVELS).optional(),
  status: z.enum(SESSION_STATUSES).optional(),
  start_date: dateQueryParam('start_date'),
  end_date: dateQueryParam('end_date'),
});

export const listSessionsQuerySchema = sessionFiltersQuerySchema.extend({
  limit: z.coerce.number().int().positive().optional(),
  exclude_user_id: z.coerce.number().int().positive().optional(),
});

export const tutorParamsSchema = z.object({
  tutorId: idParam(),
});

export const studentParamsSchema = z.object({
  studentId: idParam(),
});

export const enrollmentParamsSchema = z.object({
  id: idParam(),
  studentId: idParam(),
});

export const createSessionSchema = z.object({
  title: z.string().trim().min(1).optional(),
  description: z.string().optional(),
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional(),
  duration: z.number().int().positive(),
  seats: z.number().int().positive(),
  type: z.enum(SESSION_TYPES),
  level: z.enum(SESSION_LEVELS).optional(),
  status: z.enum(SESSION_STATUSES).optional(),
  classRoom: z.string().trim().optional(),
  tutorId: z.number().int().positive(),
  courseId: z.number().int().positive(),
});

export const sessionStatusSchema = z.object({
  status: z.enum(SESSION_STATUSES),
});

export const enrollStudentSchema = z.object({
  studentId: z.number().int().positive(),
  status: z.enum(ENROLLMENT_STATUSES).optional(),
  attended: z.boolean().optional(),
});

export const enrollmentStatusSchema = z.object({
  status: z.enum(ENROLLMENT_STATUSES),
  attended: z.boolean().optional(),
});
