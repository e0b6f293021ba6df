import { z } from 'zod';
import { booleanQueryParam, searchParam } from './common.schema';

export const listCoursesQuerySchema = z.object({
  status: booleanQueryParam(['true', '1', 'yes'], ['false', '0', 'no']),
  semester: z.coerce.number().int().positive().optional(),
  search: searchParam(),
});

export const createCourseSchema = z.object({
  code: z.string().trim().min(1).max(50).optional(),
  name: z.string().trim().min(1),
  description: z.string().trim().min(1),
  semester: z.number().int().positive(),
  status: z.boolean().optional(),
});

export const updateCourseSchema = createCourseSchema.partial();
