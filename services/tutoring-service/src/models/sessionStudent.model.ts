/**
 * Session Student Model - PostgreSQL
 * A student's enrollment in one tutoring session
 */

import type { Queryable } from '@tutoriapp/shared/databases/postgres/client';
import {
  readBoolean,
  readDate,
  readEnum,
  readObject,
  readOptionalDate,
  readOptionalNumber,
  readOptionalString,
  type Row,
} from '@tutoriapp/shared/databases/postgres/rows';
import { rowToSession, rowToSessionStudent, SESSION_STATUSES, type Session, type SessionStatus, type SessionStudent } from './session.model';
import { ENROLLMENT_STATUSES, rowToUser, type EnrollmentStatus, type User } from './user.model';

export interface EnrollmentDetails extends SessionStudent {
  session: Session | null;
  student: User | null;
}

export interface EnrollmentCreateInput {
  sessionId: number;
  studentId: number;
  status?: EnrollmentStatus;
  attended?: boolean;
}

/** One of a student's enrollments joined with the session facts the dashboards need. */
export interface EnrollmentActivity {
  status: EnrollmentStatus;
  attended: boolean;
  createdAt: Date;
  session: {
    startDate: Date | null;
    status: SessionStatus;
    duration: number | null;
    courseName: string | null;
  };
}

function rowToEnrollmentDetails(row: Row): EnrollmentDetails {
  const session = readObject(row, 'session');
  const student = readObject(row, 'student');
  return {
    ...rowToSessionStudent(row),
    session: session ? rowToSession(session) : null,
    student: student ? rowToUser(student) : null,
  };
}

// Wraps a data-modifying statement over session_students so the result carries session and student
function withRelations(statement: string): string {
  return `
    WITH changed AS (${statement})
    SELECT changed.*, row_to_json(s) AS session, to_jsonb(u) - 'password' AS student
    FROM changed
    LEFT JOIN sessions s ON s.id = changed.session_id
    LEFT JOIN users u ON u.id = changed.student_id
  `;
}

/**
 * Session Student Repository
 */
export class SessionStudentRepository {
  constructor(private db: Queryable) {}

  async findOne(sessionId: number, studentId: number): Promise<SessionStudent | null> {
    const result = await this.db.query('SELECT * FROM session_students WHERE session_id = $1 AND student_id = $2', [
      sessionId,
      studentId,
    ]);
    return result.rows.length > 0 ? rowToSessionStudent(result.rows[0]) : null;
  }

  async create(data: EnrollmentCreateInput): Promise<EnrollmentDetails> {
    const statement = `
      INSERT INTO session_students (session_id, student_id, status, attended)
      VALUES ($1, $2, $3, $4)
      RETURNING *
    `;

    const values = [data.sessionId, data.studentId, data.status || 'requested', data.attended ?? false];

    const result = await this.db.query(withRelations(statement), values);
    return rowToEnrollmentDetails(result.rows[0]);
  }

  async updateStatus(
    sessionId: number,
    studentId: number,
    status: EnrollmentStatus,
    attended?: boolean
  ): Promise<EnrollmentDetails | null> {
    const updates = ['status = $3', 'updated_at = CURRENT_TIMESTAMP'];
    const values: unknown[] = [sessionId, studentId, status];

    if (attended !== undefined) {
      updates.push('attended = $4');
      values.push(attended);
    }

    const statement = `
      UPDATE session_students
      SET ${updates.join(', ')}
      WHERE session_id = $1 AND student_id = $2
      RETURNING *
    `;

    const result = await this.db.query(withRelations(statement), values);
    return result.rows.length > 0 ? rowToEnrollmentDetails(result.rows[0]) : null;
  }

  async findActivityByStudentId(studentId: number): Promise<EnrollmentActivity[]> {
    const query = `
      SELECT ss.status, ss.attended, ss.created_at,
        s.start_date AS session_start_date,
        s.status AS session_status,
        s.duration AS session_duration,
        c.name AS course_name
      FROM session_students ss
      JOIN sessions s ON s.id = ss.session_id
      LEFT JOIN courses c ON c.id = s.course_id
      WHERE ss.student_id = $1
    `;

    const result = await this.db.query(query, [studentId]);
    return result.rows.map((row) => ({
      status: readEnum(row, 'status', ENROLLMENT_STATUSES),
      attended: readBoolean(row, 'attended'),
      createdAt: readDate(row, 'created_at'),
      session: {
        startDate: readOptionalDate(row, 'session_start_date'),
        status: readEnum(row, 'session_status', SESSION_STATUSES),
        duration: readOptionalNumber(row, 'session_duration'),
        courseName: readOptionalString(row, 'course_name'),
      },
    }));
  }
}
