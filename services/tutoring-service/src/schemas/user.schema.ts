import { z } from 'zod';
import { ENROLLMENT_STATUSES, USER_ROLES } from '../models/user.model';
import { booleanQueryParam, idParam, searchParam } from './common.schema';

export const listUsersQuerySchema = z.object({
  role: z.enum(USER_ROLES).optional(),
  status: booleanQueryParam(['true', '1'], ['false', '0']),
  search: searchParam(),
});

export const createUserSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(8, 'Password must be at least 8 characters'),
  name: z.string().trim().min(1),
  role: z.enum(USER_ROLES).optional(),
  secondName: z.string().trim().optional(),
  secondSurname: z.string().trim().optional(),
  phoneNumber: z.string().trim().min(6).max(20).optional(),
  status: z.boolean().optional(),
});

export const updateUserSchema = z.object({
  email: z.string().trim().email().optional(),
  password: z.string().min(8, 'Password must be at least 8 characters').optional(),
  name: z.string().trim().min(1).optional(),
  phoneNumber: z.string().trim().min(6).max(20).optional(),
  role: z.enum(USER_ROLES).optional(),
});

export const sessionIdParamsSchema = z.object({
  sessionId: idParam(),
});

export const studentsBySessionQuerySchema = z.object({
  search: searchParam(),
  status: z.enum(ENROLLMENT_STATUSES).optional(),
});

export type CreateUserBody = z.infer<typeof createUserSchema>;
export type UpdateUserBody = z.infer<typeof updateUserSchema>;
