import bcrypt from 'bcryptjs';
import { DatabaseRuntime } from '@tutoriapp/shared/databases/postgres/runtime';
import { FakeDatabaseClient, silentLogger } from '@tutoriapp/shared/testing/fakeDatabaseClient';
import { verifyAccessToken } from '@tutoriapp/shared/utils/tokenManager';
import { userRow } from '../../__tests__/fixtures';
import { AuthService } from '../auth.service';
import { UserService } from '../user.service';

const SECRET = 'test-secret';
const passwordHash = bcrypt.hashSync('test-password', 4);

describe('AuthService', () => {
  let client: FakeDatabaseClient;
  let runtime: DatabaseRuntime<FakeDatabaseClient>;
  let auth: AuthService;

  beforeEach(() => {
    client = new FakeDatabaseClient();
    runtime = new DatabaseRuntime(client, { logger: silentLogger });
    const users = new UserService(runtime, { saltRounds: 4 });
    auth = new AuthService(runtime, users, { secret: SECRET, expiresInSeconds: 3600 });
  });

  afterEach(async () => {
    await runtime.close();
  });

  describe('login', () => {
    it('returns a signed token for valid credentials', async () => {
      client.onQuery(() => [{ ...userRow({ role: 'admin' }), password: passwordHash }]);

      const result = await auth.login('Student@Example.com', 'test-password');

      expect(result?.user.id).toBe(5);
      expect(result?.user).not.toHaveProperty('password');
      expect(verifyAccessToken(result?.token ?? '', SECRET)).toEqual({
        sub: 5,
        role: 'admin',
        email: 'student@example.com',
      });
      expect(client.queries[0].values).toEqual(['Student@Example.com']);
    });

    it('rejects a wrong password', async () => {
      client.onQuery(() => [{ ...userRow(), password: passwordHash }]);

      await expect(auth.login('student@example.com', 'wrong-password')).resolves.toBeNull();
    });

    it('rejects an unknown email', async () => {
      client.onQuery(() => []);

      await expect(auth.login('nobody@example.com', 'test-password')).resolves.toBeNull();
    });

    it('rejects a disabled account', async () => {
      client.onQuery(() => [{ ...userRow({ status: false }), password: passwordHash }]);

      await expect(auth.login('student@example.com', 'test-password')).resolves.toBeNull();
    });
  });

  describe('register', () => {
    it('stores a hashed password and always assigns the user role', async () => {
      client.onQuery((_text, values) => [userRow({ email: values[0], name: values[2], role: values[3] })]);

      const user = await auth.register({ email: 'new@example.com', password: 'test-password', name: 'Luis' });

      expect(user).toMatchObject({ email: 'new@example.com', name: 'Luis', role: 'user' });
      const [insert] = client.queries;
      expect(insert.values[1]).not.toBe('test-password');
      expect(bcrypt.compareSync('test-password', String(insert.values[1]))).toBe(true);
      expect(insert.values[3]).toBe('user');
    });
  });
});
