import { z } from 'zod';
import { isDateParam } from '../utils/dateFilters';

export const idParam = () => z.coerce.number().int().positive();

export const idParamsSchema = z.object({
  id: idParam(),
});

/** Optional free-text filter; blank means no filter. */
export const searchParam = () =>
  z
    .string()
    .trim()
    .optional()
    .transform((value: string | undefined) => (value ? value : undefined));

/**
 * Boolean query flag written as one of the given words, e.g. ?status=1 or ?status=no.
 */
export const booleanQueryParam = (truthy: readonly string[], falsy: readonly string[]) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .refine((value) => truthy.includes(value) || falsy.includes(value), {
      message: `Expected one of ${[...truthy, ...falsy].join(', ')}`,
    })
    .transform((value) => truthy.includes(value))
    .optional();

export const dateQueryParam = (label: string) =>
  z
    .string()
    .refine(isDateParam, { message: `Invalid ${label} format, expected YYYY-MM-DD` })
    .optional();

export const statusFlagSchema = z.object({
  status: z.boolean(),
});
