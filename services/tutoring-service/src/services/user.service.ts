/**
 * User Service - Business Logic Layer
 */

import bcrypt from 'bcryptjs';
import { AppError } from '@tutoriapp/shared/config/errorHandler';
import { logDatabaseOperation } from '@tutoriapp/shared/config/logger';
import type { UnitRunner } from '@tutoriapp/shared/databases/postgres/runtime';
import {
  UserRepository,
  type SessionStudentFilters,
  type User,
  type UserFilters,
  type UserRole,
} from '../models/user.model';

export interface CreateUserInput {
  email: string;
  password: string;
  name: string;
  role?: UserRole;
  secondName?: string;
  secondSurname?: string;
  phoneNumber?: string;
  status?: boolean;
}

export interface UpdateUserInput {
  email?: string;
  password?: string;
  name?: string;
  phoneNumber?: string;
  role?: UserRole;
}

export interface UserServiceOptions {
  saltRounds?: number;
}

export class UserService {
  private readonly saltRounds: number;

  constructor(
    private database: UnitRunner,
    options: UserServiceOptions = {}
  ) {
    this.saltRounds = options.saltRounds ?? 10;
  }

  async findOne(id: number): Promise<User | null> {
    return this.database.run((client) => new UserRepository(client).findById(id));
  }

  async findMany(filters: UserFilters = {}): Promise<{ totalRecords: number; users: User[] }> {
    const users = await this.database.run((client) => new UserRepository(client).findMany(filters));
    return { totalRecords: users.length, users };
  }

  /**
   * Students enrolled in a session, optionally narrowed by enrollment status
   */
  async findManyBySessionId(
    sessionId: number,
    filters: SessionStudentFilters = {}
  ): Promise<{ totalRecords: number; students: User[] }> {
    const students = await this.database.run((client) =>
      new UserRepository(client).findManyBySessionId(sessionId, filters)
    );
    return { totalRecords: students.length, students };
  }

  async create(input: CreateUserInput): Promise<User> {
    const { password, ...rest } = input;
    const passwordHash = await bcrypt.hash(password, this.saltRounds);

    const user = await this.database.run((client) => new UserRepository(client).create({ ...rest, passwordHash }));
    logDatabaseOperation('insert', 'users', { userId: user.id });
    return user;
  }

  /**
   * @throws AppError (400) when the input carries no field to change
   */
  async update(id: number, input: UpdateUserInput): Promise<User | null> {
    const { password, ...rest } = input;
    const changes = Object.fromEntries(Object.entries(rest).filter(([, value]) => value !== undefined));
    if (Object.keys(changes).length === 0 && password === undefined) {
      throw new AppError('No fields to update', 400);
    }

    const passwordHash = password === undefined ? undefined : await bcrypt.hash(password, this.saltRounds);

    const user = await this.database.run((client) => new UserRepository(client).update(id, { ...rest, passwordHash }));
    if (user) {
      logDatabaseOperation('update', 'users', { userId: id, fields: Object.keys(changes) });
    }
    return user;
  }

  async updateStatus(id: number, status: boolean): Promise<User | null> {
    return this.database.run((client) => new UserRepository(client).updateStatus(id, status));
  }
}
