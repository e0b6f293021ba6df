/**
 * User Model - PostgreSQL
 * Accounts for administrators, tutors and students
 */

import type { Queryable } from '@tutoriapp/shared/databases/postgres/client';
import {
  readBoolean,
  readDate,
  readEnum,
  readNumber,
  readOptionalString,
  readString,
  type Row,
} from '@tutoriapp/shared/databases/postgres/rows';
import { containsPattern, QueryConditions } from '../utils/sql';

export const USER_ROLES = ['admin', 'user'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const ENROLLMENT_STATUSES = ['requested', 'registered', 'absent', 'attended', 'rejected'] as const;
export type EnrollmentStatus = (typeof ENROLLMENT_STATUSES)[number];

export interface User {
  id: number;
  email: string;
  name: string;
  secondName: string | null;
  secondSurname: string | null;
  phoneNumber: string | null;
  role: UserRole;
  status: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface UserCredentials {
  user: User;
  passwordHash: string;
}

export interface UserCreateInput {
  email: string;
  passwordHash: string;
  name: string;
  role?: UserRole;
  secondName?: string;
  secondSurname?: string;
  phoneNumber?: string;
  status?: boolean;
}

export interface UserUpdateInput {
  email?: string;
  passwordHash?: string;
  name?: string;
  phoneNumber?: string;
  role?: UserRole;
}

export interface UserFilters {
  role?: UserRole;
  status?: boolean;
  search?: string;
}

export interface SessionStudentFilters {
  search?: string;
  status?: EnrollmentStatus;
}

// Never select the password hash except for credential checks
const USER_COLUMNS = `id, email, name, second_name, second_surname, phone_number, role, status, created_at, updated_at`;

/**
 * Convert database row (or its row_to_json form) to User object
 */
export function rowToUser(row: Row): User {
  return {
    id: readNumber(row, 'id'),
    email: readString(row, 'email'),
    name: readString(row, 'name'),
    secondName: readOptionalString(row, 'second_name'),
    secondSurname: readOptionalString(row, 'second_surname'),
    phoneNumber: readOptionalString(row, 'phone_number'),
    role: readEnum(row, 'role', USER_ROLES),
    status: readBoolean(row, 'status', true),
    createdAt: readDate(row, 'created_at'),
    updatedAt: readDate(row, 'updated_at'),
  };
}

/**
 * User Repository
 */
export class UserRepository {
  constructor(private db: Queryable) {}

  async findById(id: number): Promise<User | null> {
    const result = await this.db.query(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
  }

  async findCredentialsByEmail(email: string): Promise<UserCredentials | null> {
    const result = await this.db.query(`SELECT ${USER_COLUMNS}, password FROM users WHERE LOWER(email) = LOWER($1)`, [
      email,
    ]);
    if (result.rows.length === 0) {
      return null;
    }
    const row = result.rows[0];
    return { user: rowToUser(row), passwordHash: readString(row, 'password') };
  }

  async findMany(filters: UserFilters = {}): Promise<User[]> {
    const where = new QueryConditions();

    if (filters.role) {
      where.add(`role = ${where.param(filters.role)}`);
    }

    if (filters.status !== undefined) {
      where.add(`status = ${where.param(filters.status)}`);
    }

    if (filters.search) {
      const pattern = where.param(containsPattern(filters.search));
      where.add(`(email ILIKE ${pattern} OR name ILIKE ${pattern})`);
    }

    const result = await this.db.query(
      `SELECT ${USER_COLUMNS} FROM users ${where.whereClause} ORDER BY name ASC`,
      where.values
    );
    return result.rows.map(rowToUser);
  }

  async findManyBySessionId(sessionId: number, filters: SessionStudentFilters = {}): Promise<User[]> {
    const where = new QueryConditions();
    const enrollment = [`ss.student_id = users.id`, `ss.session_id = ${where.param(sessionId)}`];

    if (filters.status) {
      enrollment.push(`ss.status = ${where.param(filters.status)}`);
    }
    where.add(`EXISTS (SELECT 1 FROM session_students ss WHERE ${enrollment.join(' AND ')})`);

    if (filters.search) {
      const pattern = where.param(containsPattern(filters.search));
      where.add(`(email ILIKE ${pattern} OR name ILIKE ${pattern})`);
    }

    const result = await this.db.query(
      `SELECT ${USER_COLUMNS} FROM users ${where.whereClause} ORDER BY name ASC`,
      where.values
    );
    return result.rows.map(rowToUser);
  }

  async create(data: UserCreateInput): Promise<User> {
    const query = `
      INSERT INTO users (
        email, password, name, role, second_name, second_surname, phone_number, status
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      RETURNING ${USER_COLUMNS}
    `;

    const values = [
      data.email,
      data.passwordHash,
      data.name,
      data.role || 'user',
      data.secondName || null,
      data.secondSurname || null,
      data.phoneNumber || null,
      data.status ?? true,
    ];

    const result = await this.db.query(query, values);
    return rowToUser(result.rows[0]);
  }

  async update(id: number, data: UserUpdateInput): Promise<User | null> {
    const updates: string[] = [];
    const values: unknown[] = [];
    let paramCount = 1;

    if (data.email !== undefined) {
      updates.push(`email = $${paramCount++}`);
      values.push(data.email);
    }

    if (data.passwordHash !== undefined) {
      updates.push(`password = $${paramCount++}`);
      values.push(data.passwordHash);
    }

    if (data.name !== undefined) {
      updates.push(`name = $${paramCount++}`);
      values.push(data.name);
    }

    if (data.phoneNumber !== undefined) {
      updates.push(`phone_number = $${paramCount++}`);
      values.push(data.phoneNumber);
    }

    if (data.role !== undefined) {
      updates.push(`role = $${paramCount++}`);
      values.push(data.role);
    }

    if (updates.length === 0) {
      return this.findById(id);
    }

    updates.push(`updated_at = CURRENT_TIMESTAMP`);
    values.push(id);

    const query = `
      UPDATE users
      SET ${updates.join(', ')}
      WHERE id = $${paramCount}
      RETURNING ${USER_COLUMNS}
    `;

    const result = await this.db.query(query, values);
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
  }

  async updateStatus(id: number, status: boolean): Promise<User | null> {
    const result = await this.db.query(
      `UPDATE users SET status = $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2 RETURNING ${USER_COLUMNS}`,
      [status, id]
    );
    return result.rows.length > 0 ? rowToUser(result.rows[0]) : null;
  }
}
