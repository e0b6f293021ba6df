/**
 * Session Model - PostgreSQL
 * Tutoring sessions and the enrollments (session_students) attached to them
 */

import type { Queryable } from '@tutoriapp/shared/databases/postgres/client';
import {
  readBoolean,
  readDate,
  readEnum,
  readNumber,
  readNumberArray,
  readObject,
  readObjectArray,
  readOptionalDate,
  readOptionalEnum,
  readOptionalNumber,
  readOptionalString,
  type Row,
} from '@tutoriapp/shared/databases/postgres/rows';
import { containsPattern, QueryConditions } from '../utils/sql';
import { rowToCourse, type Course } from './course.model';
import { ENROLLMENT_STATUSES, rowToUser, type EnrollmentStatus, type User } from './user.model';

export const SESSION_STATUSES = ['pending', 'confirmed', 'cancelled'] as const;
export type SessionStatus = (typeof SESSION_STATUSES)[number];

export const SESSION_LEVELS = ['basic', 'medium', 'advanced'] as const;
export type SessionLevel = (typeof SESSION_LEVELS)[number];

export const SESSION_TYPES = ['online', 'in_person'] as const;
export type SessionType = (typeof SESSION_TYPES)[number];

export interface Session {
  id: number;
  title: string | null;
  description: string | null;
  startDate: Date | null;
  endDate: Date | null;
  duration: number;
  seats: number;
  type: SessionType;
  level: SessionLevel | null;
  status: SessionStatus;
  classRoom: string | null;
  tutorId: number;
  courseId: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface SessionStudent {
  id: number;
  sessionId: number;
  studentId: number;
  status: EnrollmentStatus;
  attended: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface SessionDetails extends Session {
  course: Course | null;
  tutor: User | null;
  students: SessionStudent[];
}

export interface SessionCreateInput {
  title?: string;
  description?: string;
  startDate?: Date;
  endDate?: Date;
  duration: number;
  seats: number;
  type: SessionType;
  level?: SessionLevel;
  status?: SessionStatus;
  classRoom?: string;
  tutorId: number;
  courseId: number;
}

export interface SessionFilters {
  search?: string;
  level?: SessionLevel;
  status?: SessionStatus;
  from?: Date;
  to?: Date;
}

export interface SessionListFilters extends SessionFilters {
  limit?: number;
  excludeUserId?: number;
}

/** One of a tutor's sessions, reduced to what the dashboard needs. */
export interface TutorSessionActivity {
  title: string | null;
  startDate: Date | null;
  duration: number | null;
  seats: number | null;
  status: SessionStatus;
  studentIds: number[];
}

export function rowToSession(row: Row): Session {
  return {
    id: readNumber(row, 'id'),
    title: readOptionalString(row, 'title'),
    description: readOptionalString(row, 'description'),
    startDate: readOptionalDate(row, 'start_date'),
    endDate: readOptionalDate(row, 'end_date'),
    duration: readNumber(row, 'duration'),
    seats: readNumber(row, 'seats'),
    type: readEnum(row, 'type', SESSION_TYPES),
    level: readOptionalEnum(row, 'level', SESSION_LEVELS),
    status: readEnum(row, 'status', SESSION_STATUSES),
    classRoom: readOptionalString(row, 'class_room'),
    tutorId: readNumber(row, 'tutor_id'),
    courseId: readNumber(row, 'course_id'),
    createdAt: readDate(row, 'created_at'),
    updatedAt: readDate(row, 'updated_at'),
  };
}

export function rowToSessionStudent(row: Row): SessionStudent {
  return {
    id: readNumber(row, 'id'),
    sessionId: readNumber(row, 'session_id'),
    studentId: readNumber(row, 'student_id'),
    status: readEnum(row, 'status', ENROLLMENT_STATUSES),
    attended: readBoolean(row, 'attended'),
    createdAt: readDate(row, 'created_at'),
    updatedAt: readDate(row, 'updated_at'),
  };
}

export function rowToSessionDetails(row: Row): SessionDetails {
  const course = readObject(row, 'course');
  const tutor = readObject(row, 'tutor');
  return {
    ...rowToSession(row),
    course: course ? rowToCourse(course) : null,
    tutor: tutor ? rowToUser(tutor) : null,
    students: readObjectArray(row, 'students').map(rowToSessionStudent),
  };
}

// Session columns plus course, tutor (without password) and enrollments as JSON
const SESSION_DETAILS_SELECT = `
  SELECT s.*,
    row_to_json(c) AS course,
    to_jsonb(t) - 'password' AS tutor,
    COALESCE(
      (SELECT json_agg(ss ORDER BY ss.id) FROM session_students ss WHERE ss.session_id = s.id),
      '[]'::json
    ) AS students
  FROM sessions s
  LEFT JOIN courses c ON c.id = s.course_id
  LEFT JOIN users t ON t.id = s.tutor_id
`;

/**
 * Session Repository
 */
export class SessionRepository {
  constructor(private db: Queryable) {}

  async exists(id: number): Promise<boolean> {
    const result = await this.db.query('SELECT 1 FROM sessions WHERE id = $1', [id]);
    return result.rows.length > 0;
  }

  async findById(id: number): Promise<SessionDetails | null> {
    const result = await this.db.query(`${SESSION_DETAILS_SELECT} WHERE s.id = $1`, [id]);
    return result.rows.length > 0 ? rowToSessionDetails(result.rows[0]) : null;
  }

  async findMany(filters: SessionListFilters = {}): Promise<SessionDetails[]> {
    const where = this.buildFilters(filters);

    if (filters.excludeUserId !== undefined) {
      where.add(
        `NOT EXISTS (SELECT 1 FROM session_students x WHERE x.session_id = s.id AND x.student_id = ${where.param(filters.excludeUserId)})`
      );
    }

    const limitClause = filters.limit ? `LIMIT ${where.param(filters.limit)}` : '';

    const result = await this.db.query(
      `${SESSION_DETAILS_SELECT} ${where.whereClause} ORDER BY s.start_date ASC NULLS LAST, s.id ASC ${limitClause}`,
      where.values
    );
    return result.rows.map(rowToSessionDetails);
  }

  async findManyByTutorId(tutorId: number, filters: SessionFilters = {}): Promise<SessionDetails[]> {
    const where = this.buildFilters(filters);
    where.add(`s.tutor_id = ${where.param(tutorId)}`);

    const result = await this.db.query(
      `${SESSION_DETAILS_SELECT} ${where.whereClause} ORDER BY s.start_date ASC NULLS LAST, s.id ASC`,
      where.values
    );
    return result.rows.map(rowToSessionDetails);
  }

  /**
   * Sessions the student is enrolled in. Both date bounds apply to start_date.
   */
  async findManyByStudentId(studentId: number, filters: SessionFilters = {}): Promise<SessionDetails[]> {
    const { from, to, ...rest } = filters;
    const where = this.buildFilters(rest);
    where.add(
      `EXISTS (SELECT 1 FROM session_students x WHERE x.session_id = s.id AND x.student_id = ${where.param(studentId)})`
    );

    if (from) {
      where.add(`s.start_date >= ${where.param(from)}`);
    }
    if (to) {
      where.add(`s.start_date <= ${where.param(to)}`);
    }

    const result = await this.db.query(
      `${SESSION_DETAILS_SELECT} ${where.whereClause} ORDER BY s.start_date ASC NULLS LAST, s.id ASC`,
      where.values
    );
    return result.rows.map(rowToSessionDetails);
  }

  async create(data: SessionCreateInput): Promise<number> {
    const query = `
      INSERT INTO sessions (
        title, description, start_date, end_date, duration, seats, type,
        level, status, class_room, tutor_id, course_id
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
      RETURNING id
    `;

    const values = [
      data.title ?? null,
      data.description ?? null,
      data.startDate ?? null,
      data.endDate ?? null,
      data.duration,
      data.seats,
      data.type,
      data.level ?? null,
      data.status || 'pending',
      data.classRoom ?? null,
      data.tutorId,
      data.courseId,
    ];

    const result = await this.db.query(query, values);
    return readNumber(result.rows[0], 'id');
  }

  async updateStatus(id: number, status: SessionStatus): Promise<boolean> {
    const result = await this.db.query(
      'UPDATE sessions SET status = $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2',
      [status, id]
    );
    return result.rowCount > 0;
  }

  async findActivityByTutorId(tutorId: number): Promise<TutorSessionActivity[]> {
    const query = `
      SELECT s.title, s.start_date, s.duration, s.seats, s.status,
        COALESCE(array_agg(ss.student_id) FILTER (WHERE ss.student_id IS NOT NULL), '{}') AS student_ids
      FROM sessions s
      LEFT JOIN session_students ss ON ss.session_id = s.id
      WHERE s.tutor_id = $1
      GROUP BY s.id
    `;

    const result = await this.db.query(query, [tutorId]);
    return result.rows.map((row) => ({
      title: readOptionalString(row, 'title'),
      startDate: readOptionalDate(row, 'start_date'),
      duration: readOptionalNumber(row, 'duration'),
      seats: readOptionalNumber(row, 'seats'),
      status: readEnum(row, 'status', SESSION_STATUSES),
      studentIds: readNumberArray(row, 'student_ids'),
    }));
  }

  private buildFilters(filters: SessionFilters): QueryConditions {
    const where = new QueryConditions();

    if (filters.level) {
      where.add(`s.level = ${where.param(filters.level)}`);
    }

    if (filters.status) {
      where.add(`s.status = ${where.param(filters.status)}`);
    }

    if (filters.search) {
      const pattern = where.param(containsPattern(filters.search));
      where.add(`(s.title ILIKE ${pattern} OR c.name ILIKE ${pattern})`);
    }

    if (filters.from) {
      where.add(`s.start_date >= ${where.param(filters.from)}`);
    }

    if (filters.to) {
      where.add(`s.end_date <= ${where.param(filters.to)}`);
    }

    return where;
  }
}
