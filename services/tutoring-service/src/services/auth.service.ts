/**
 * Auth Service - credential checks and access tokens
 */

import bcrypt from 'bcryptjs';
import { logAuthEvent } from '@tutoriapp/shared/config/logger';
import type { UnitRunner } from '@tutoriapp/shared/databases/postgres/runtime';
import { signAccessToken, type TokenSettings } from '@tutoriapp/shared/utils/tokenManager';
import { UserRepository, type User } from '../models/user.model';
import type { UserService } from './user.service';

export interface LoginResult {
  token: string;
  user: User;
}

export interface RegisterInput {
  email: string;
  password: string;
  name: string;
  secondName?: string;
  secondSurname?: string;
  phoneNumber?: string;
}

export class AuthService {
  constructor(
    private database: UnitRunner,
    private users: UserService,
    private tokens: TokenSettings
  ) {}

  /**
   * Returns null for an unknown email, a wrong password or a disabled account.
   */
  async login(email: string, password: string): Promise<LoginResult | null> {
    const credentials = await this.database.run((client) => new UserRepository(client).findCredentialsByEmail(email));

    if (!credentials || !(await bcrypt.compare(password, credentials.passwordHash))) {
      logAuthEvent('login', credentials?.user.id, false, { reason: 'invalid_credentials' });
      return null;
    }

    const { user } = credentials;
    if (!user.status) {
      logAuthEvent('login', user.id, false, { reason: 'account_disabled' });
      return null;
    }

    const token = signAccessToken({ sub: user.id, role: user.role, email: user.email }, this.tokens);
    logAuthEvent('login', user.id, true);
    return { token, user };
  }

  /**
   * Self-service sign-up always creates a regular user account.
   */
  async register(input: RegisterInput): Promise<User> {
    const user = await this.users.create({ ...input, role: 'user' });
    logAuthEvent('register', user.id, true);
    return user;
  }
}
