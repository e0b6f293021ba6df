import { z } from 'zod';
import { AppError } from '../../config/errorHandler';
import { DatabaseError } from '../../databases/postgres/errors';
import { resolveError } from '../globalErrorHandler';

describe('resolveError', () => {
	it('turns validation failures into 400 with field errors', () => {
		const result = z.object({ email: z.string().email() }).safeParse({ email: 'not-an-email' });
		if (result.success) {
			throw new Error('expected validation to fail');
		}

		expect(resolveError(result.error)).toEqual({
			statusCode: 400,
			message: 'Validation error',
			errors: [{ field: 'email', message: 'Invalid email' }],
		});
	});

	it('maps database error categories without leaking driver messages', () => {
		expect(resolveError(new DatabaseError('duplicate key value violates unique constraint', 'constraint', { code: '23505' }))).toEqual({
			statusCode: 409,
			message: 'Resource already exists',
		});
		expect(resolveError(new DatabaseError('insert violates foreign key', 'constraint', { code: '23503' }))).toEqual({
			statusCode: 400,
			message: 'Referenced resource does not exist',
		});
		expect(resolveError(new DatabaseError('Connection terminated', 'connection'))).toEqual({
			statusCode: 503,
			message: 'Database temporarily unavailable',
		});
		expect(resolveError(new DatabaseError('syntax error at or near "FORM"', 'query', { code: '42601' }))).toEqual({
			statusCode: 500,
			message: 'Something went wrong',
		});
	});

	it('shows operational application errors only', () => {
		expect(resolveError(new AppError('No fields to update', 400))).toEqual({ statusCode: 400, message: 'No fields to update' });
		expect(resolveError(new AppError('row could not be read back', 500, false))).toEqual({
			statusCode: 500,
			message: 'Something went wrong',
		});
	});

	it('honours the status and expose flag of http errors', () => {
		const tooLarge = Object.assign(new Error('request entity too large'), { status: 413, expose: true });
		const timedOut = Object.assign(new Error('Response timeout'), { status: 503, expose: false });

		expect(resolveError(tooLarge)).toEqual({ statusCode: 413, message: 'request entity too large' });
		expect(resolveError(timedOut)).toEqual({ statusCode: 503, message: 'Something went wrong' });
	});

	it('answers 500 for anything else', () => {
		expect(resolveError(new TypeError('Cannot read properties of undefined'))).toEqual({
			statusCode: 500,
			message: 'Something went wrong',
		});
	});
});
