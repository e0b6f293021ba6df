import jwt from 'jsonwebtoken';
import { AppError } from '../config/errorHandler';
import { isNonEmptyString } from './typeGuards';

export interface AccessTokenPayload {
	sub: number;
	role: string;
	email: string;
}

export interface TokenSettings {
	secret: string;
	expiresInSeconds: number;
}

const DEFAULT_ACCESS_EXPIRES_IN_SECONDS = 24 * 60 * 60;

export function signAccessToken(payload: AccessTokenPayload, settings: TokenSettings): string {
	return jwt.sign(
		{ sub: String(payload.sub), role: payload.role, email: payload.email },
		settings.secret,
		{ expiresIn: settings.expiresInSeconds || DEFAULT_ACCESS_EXPIRES_IN_SECONDS }
	);
}

/**
 * Verify signature and expiry, then check the claims have the expected shape.
 *
 * @throws AppError (401) for any invalid, expired or malformed token
 */
export function verifyAccessToken(token: string, secret: string): AccessTokenPayload {
	let decoded: string | jwt.JwtPayload;
	try {
		decoded = jwt.verify(token, secret);
	} catch (error) {
		const message = error instanceof jwt.TokenExpiredError ? 'Token expired' : 'Invalid token';
		throw new AppError(message, 401, true, { cause: error });
	}

	if (typeof decoded === 'string') {
		throw new AppError('Invalid token', 401);
	}

	const sub = Number(decoded.sub);
	const { role, email } = decoded;
	if (!Number.isInteger(sub) || !isNonEmptyString(role) || !isNonEmptyString(email)) {
		throw new AppError('Invalid token payload', 401);
	}

	return { sub, role, email };
}
