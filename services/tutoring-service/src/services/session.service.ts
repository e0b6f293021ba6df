/**
 * Session Service - Business Logic Layer
 * Tutoring sessions, enrollments and the dashboards built on them
 */

import { AppError } from '@tutoriapp/shared/config/errorHandler';
import { logDatabaseOperation } from '@tutoriapp/shared/config/logger';
import { DatabaseError } from '@tutoriapp/shared/databases/postgres/errors';
import type { UnitRunner } from '@tutoriapp/shared/databases/postgres/runtime';
import {
  SessionRepository,
  type SessionCreateInput,
  type SessionDetails,
  type SessionFilters,
  type SessionListFilters,
  type SessionStatus,
  type SessionStudent,
} from '../models/session.model';
import {
  SessionStudentRepository,
  type EnrollmentCreateInput,
  type EnrollmentDetails,
} from '../models/sessionStudent.model';
import { UserRepository, type EnrollmentStatus } from '../models/user.model';
import {
  computeStudentStats,
  computeStudentStatsHistory,
  computeTutorStats,
  type StudentStats,
  type StudentStatsHistory,
  type TutorStats,
} from './sessionStats';

export interface SessionList<T extends SessionDetails = SessionDetails> {
  totalRecords: number;
  sessions: T[];
}

export type ListedSession = SessionDetails & { enrolled: number };

/** A student's own view of a session: their enrollment, and only theirs. */
export type StudentSession = SessionDetails & { attendance: SessionStudent | null };

export type EnrollmentResult =
  | { ok: true; enrollment: EnrollmentDetails }
  | { ok: false; reason: 'session_not_found' | 'student_not_found' | 'already_enrolled' };

const UNIQUE_VIOLATION = '23505';

export class SessionService {
  constructor(private database: UnitRunner) {}

  async findOne(id: number): Promise<SessionDetails | null> {
    return this.database.run((client) => new SessionRepository(client).findById(id));
  }

  async findMany(filters: SessionListFilters = {}): Promise<SessionList<ListedSession>> {
    const sessions = await this.database.run((client) => new SessionRepository(client).findMany(filters));
    const listed = sessions.map((session) => ({ ...session, enrolled: session.students.length }));
    return { totalRecords: listed.length, sessions: listed };
  }

  async findManyByTutorId(tutorId: number, filters: SessionFilters = {}): Promise<SessionList> {
    const sessions = await this.database.run((client) =>
      new SessionRepository(client).findManyByTutorId(tutorId, filters)
    );
    return { totalRecords: sessions.length, sessions };
  }

  async findManyByStudentId(studentId: number, filters: SessionFilters = {}): Promise<SessionList<StudentSession>> {
    const sessions = await this.database.run((client) =>
      new SessionRepository(client).findManyByStudentId(studentId, filters)
    );

    const own = sessions.map((session) => {
      const attendance = session.students.find((enrollment) => enrollment.studentId === studentId) ?? null;
      return { ...session, attendance, students: attendance ? [attendance] : [] };
    });
    return { totalRecords: own.length, sessions: own };
  }

  async create(data: SessionCreateInput): Promise<SessionDetails> {
    const session = await this.database.run(async (client) => {
      const sessions = new SessionRepository(client);
      const id = await sessions.create(data);
      return sessions.findById(id);
    });

    if (!session) {
      throw new AppError('Session was created but could not be read back', 500, false);
    }
    logDatabaseOperation('insert', 'sessions', { sessionId: session.id });
    return session;
  }

  async updateStatus(id: number, status: SessionStatus): Promise<SessionDetails | null> {
    return this.database.run(async (client) => {
      const sessions = new SessionRepository(client);
      const updated = await sessions.updateStatus(id, status);
      return updated ? sessions.findById(id) : null;
    });
  }

  async updateStudentStatus(
    sessionId: number,
    studentId: number,
    status: EnrollmentStatus,
    attended?: boolean
  ): Promise<EnrollmentDetails | null> {
    return this.database.run((client) =>
      new SessionStudentRepository(client).updateStatus(sessionId, studentId, status, attended)
    );
  }

  /**
   * Enroll a student in a session. Missing session, missing student and an
   * existing enrollment are reported as outcomes, not thrown.
   */
  async enrollStudent(input: EnrollmentCreateInput): Promise<EnrollmentResult> {
    const result = await this.database.run(async (client): Promise<EnrollmentResult> => {
      if (!(await new SessionRepository(client).exists(input.sessionId))) {
        return { ok: false, reason: 'session_not_found' };
      }
      if (!(await new UserRepository(client).findById(input.studentId))) {
        return { ok: false, reason: 'student_not_found' };
      }

      const enrollments = new SessionStudentRepository(client);
      if (await enrollments.findOne(input.sessionId, input.studentId)) {
        return { ok: false, reason: 'already_enrolled' };
      }

      try {
        return { ok: true, enrollment: await enrollments.create(input) };
      } catch (error) {
        // a concurrent request enrolled the same student first
        if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION) {
          return { ok: false, reason: 'already_enrolled' };
        }
        throw error;
      }
    });

    if (result.ok) {
      logDatabaseOperation('insert', 'session_students', {
        sessionId: input.sessionId,
        studentId: input.studentId,
      });
    }
    return result;
  }

  async getStudentStats(studentId: number, now: Date = new Date()): Promise<StudentStats> {
    const activity = await this.database.run((client) =>
      new SessionStudentRepository(client).findActivityByStudentId(studentId)
    );
    return computeStudentStats(activity, now);
  }

  async getStudentStatsHistory(studentId: number, now: Date = new Date()): Promise<StudentStatsHistory> {
    const activity = await this.database.run((client) =>
      new SessionStudentRepository(client).findActivityByStudentId(studentId)
    );
    return computeStudentStatsHistory(activity, now);
  }

  async getTutorStats(tutorId: number, now: Date = new Date()): Promise<TutorStats> {
    const activity = await this.database.run((client) => new SessionRepository(client).findActivityByTutorId(tutorId));
    return computeTutorStats(activity, now);
  }
}
