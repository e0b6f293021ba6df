/**
 * Course Model - PostgreSQL
 */

import type { Queryable } from '@tutoriapp/shared/databases/postgres/client';
import {
  readBoolean,
  readDate,
  readNumber,
  readOptionalString,
  readString,
  type Row,
} from '@tutoriapp/shared/databases/postgres/rows';
import { containsPattern, QueryConditions } from '../utils/sql';

export interface Course {
  id: number;
  code: string | null;
  name: string;
  description: string;
  semester: number;
  status: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface CourseCreateInput {
  code?: string;
  name: string;
  description: string;
  semester: number;
  status?: boolean;
}

export interface CourseUpdateInput {
  code?: string;
  name?: string;
  description?: string;
  semester?: number;
  status?: boolean;
}

export interface CourseFilters {
  search?: string;
  semester?: number;
  status?: boolean;
}

/**
 * Convert database row to Course object
 */
export function rowToCourse(row: Row): Course {
  return {
    id: readNumber(row, 'id'),
    code: readOptionalString(row, 'code'),
    name: readString(row, 'name'),
    description: readString(row, 'description'),
    semester: readNumber(row, 'semester'),
    status: readBoolean(row, 'status', true),
    createdAt: readDate(row, 'created_at'),
    updatedAt: readDate(row, 'updated_at'),
  };
}

/**
 * Course Repository
 */
export class CourseRepository {
  constructor(private db: Queryable) {}

  async findById(id: number): Promise<Course | null> {
    const result = await this.db.query('SELECT * FROM courses WHERE id = $1', [id]);
    return result.rows.length > 0 ? rowToCourse(result.rows[0]) : null;
  }

  async findMany(filters: CourseFilters = {}): Promise<Course[]> {
    const where = new QueryConditions();

    if (filters.status !== undefined) {
      where.add(`status = ${where.param(filters.status)}`);
    }

    if (filters.semester !== undefined) {
      where.add(`semester = ${where.param(filters.semester)}`);
    }

    if (filters.search) {
      const pattern = where.param(containsPattern(filters.search));
      where.add(`(name ILIKE ${pattern} OR description ILIKE ${pattern} OR code ILIKE ${pattern})`);
    }

    const result = await this.db.query(`SELECT * FROM courses ${where.whereClause} ORDER BY id ASC`, where.values);
    return result.rows.map(rowToCourse);
  }

  async create(data: CourseCreateInput): Promise<Course> {
    const query = `
      INSERT INTO courses (code, name, description, semester, status)
      VALUES ($1, $2, $3, $4, $5)
      RETURNING *
    `;

    const values = [data.code || null, data.name, data.description, data.semester, data.status ?? true];

    const result = await this.db.query(query, values);
    return rowToCourse(result.rows[0]);
  }

  async update(id: number, data: CourseUpdateInput): Promise<Course | null> {
    const updates: string[] = [];
    const values: unknown[] = [];
    let paramCount = 1;

    if (data.code !== undefined) {
      updates.push(`code = $${paramCount++}`);
      values.push(data.code);
    }

    if (data.name !== undefined) {
      updates.push(`name = $${paramCount++}`);
      values.push(data.name);
    }

    if (data.description !== undefined) {
      updates.push(`description = $${paramCount++}`);
      values.push(data.description);
    }

    if (data.semester !== undefined) {
      updates.push(`semester = $${paramCount++}`);
      values.push(data.semester);
    }

    if (data.status !== undefined) {
      updates.push(`status = $${paramCount++}`);
      values.push(data.status);
    }

    if (updates.length === 0) {
      return this.findById(id);
    }

    updates.push(`updated_at = CURRENT_TIMESTAMP`);
    values.push(id);

    const query = `
      UPDATE courses
      SET ${updates.join(', ')}
      WHERE id = $${paramCount}
      RETURNING *
    `;

    const result = await this.db.query(query, values);
    return result.rows.length > 0 ? rowToCourse(result.rows[0]) : null;
  }
}
