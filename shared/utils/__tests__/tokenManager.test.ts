import jwt from 'jsonwebtoken';
import { signAccessToken, verifyAccessToken } from '../tokenManager';

const SECRET = 'test-secret';

describe('tokenManager', () => {
	it('signs the user id as subject and reads it back as a number', () => {
		const token = signAccessToken({ sub: 42, role: 'admin', email: 'admin@example.com' }, { secret: SECRET, expiresInSeconds: 900 });

		const decoded = jwt.decode(token);
		expect(decoded).toMatchObject({ sub: '42', role: 'admin', email: 'admin@example.com' });
		expect(verifyAccessToken(token, SECRET)).toEqual({ sub: 42, role: 'admin', email: 'admin@example.com' });
	});

	it('sets the expiry from the configured seconds', () => {
		const token = signAccessToken({ sub: 1, role: 'user', email: 'a@example.com' }, { secret: SECRET, expiresInSeconds: 900 });

		const decoded = jwt.decode(token);
		if (!decoded || typeof decoded === 'string' || decoded.exp === undefined || decoded.iat === undefined) {
			throw new Error('expected a decoded payload with exp and iat');
		}
		expect(decoded.exp - decoded.iat).toBe(900);
	});

	it('rejects malformed tokens and unexpected claims with 401', () => {
		expect(() => verifyAccessToken('not.a.token', SECRET)).toThrow('Invalid token');

		const noEmail = jwt.sign({ sub: '7', role: 'user' }, SECRET);
		expect(() => verifyAccessToken(noEmail, SECRET)).toThrow('Invalid token payload');

		const textSubject = jwt.sign({ sub: 'abc', role: 'user', email: 'a@example.com' }, SECRET);
		expect(() => verifyAccessToken(textSubject, SECRET)).toThrow('Invalid token payload');
	});
});
