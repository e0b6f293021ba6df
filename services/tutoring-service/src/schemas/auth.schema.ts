import { z } from 'zod';

export const loginSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1, 'Password is required'),
});

export const registerSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(8, 'Password must be at least 8 characters'),
  name: z.string().trim().min(1),
  secondName: z.string().trim().optional(),
  secondSurname: z.string().trim().optional(),
  phoneNumber: z.string().trim().min(6).max(20).optional(),
});
