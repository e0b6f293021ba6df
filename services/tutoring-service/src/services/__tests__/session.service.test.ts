import { DatabaseError } from '@tutoriapp/shared/databases/postgres/errors';
import { DatabaseRuntime } from '@tutoriapp/shared/databases/postgres/runtime';
import { connectionLost, FakeDatabaseClient, silentLogger } from '@tutoriapp/shared/testing/fakeDatabaseClient';
import { enrollmentJson, sessionJson, userRow } from '../../__tests__/fixtures';
import { SessionService } from '../session.service';

describe('SessionService', () => {
  let client: FakeDatabaseClient;
  let runtime: DatabaseRuntime<FakeDatabaseClient>;
  let service: SessionService;

  beforeEach(() => {
    client = new FakeDatabaseClient();
    runtime = new DatabaseRuntime(client, { logger: silentLogger });
    service = new SessionService(runtime);
  });

  afterEach(async () => {
    await runtime.close();
  });

  describe('enrollStudent', () => {
    it('reports a missing session', async () => {
      client.onQuery(() => []);

      await expect(service.enrollStudent({ sessionId: 3, studentId: 5 })).resolves.toEqual({
        ok: false,
        reason: 'session_not_found',
      });
      expect(client.queries).toHaveLength(1);
    });

    it('reports a missing student', async () => {
      client.onQuery((text) => (text.includes('FROM sessions WHERE id') ? [{ exists: 1 }] : []));

      await expect(service.enrollStudent({ sessionId: 3, studentId: 5 })).resolves.toEqual({
        ok: false,
        reason: 'student_not_found',
      });
    });

    it('reports an existing enrollment without inserting', async () => {
      client.onQuery((text) => {
        if (text.includes('FROM sessions WHERE id')) return [{ exists: 1 }];
        if (text.includes('FROM users WHERE id')) return [userRow()];
        if (text.includes('FROM session_students WHERE')) return [enrollmentJson()];
        return [];
      });

      await expect(service.enrollStudent({ sessionId: 3, studentId: 5 })).resolves.toEqual({
        ok: false,
        reason: 'already_enrolled',
      });
      expect(client.queries.some((query) => query.text.includes('INSERT'))).toBe(false);
    });

    it('maps a concurrent duplicate insert to already_enrolled', async () => {
      client.onQuery((text) => {
        if (text.includes('FROM sessions WHERE id')) return [{ exists: 1 }];
        if (text.includes('FROM users WHERE id')) return [userRow()];
        if (text.includes('INSERT INTO session_students')) {
          throw new DatabaseError('duplicate key value', 'constraint', { code: '23505' });
        }
        return [];
      });

      await expect(service.enrollStudent({ sessionId: 3, studentId: 5 })).resolves.toEqual({
        ok: false,
        reason: 'already_enrolled',
      });
    });

    it('creates the enrollment with its session and student', async () => {
      client.onQuery((text) => {
        if (text.includes('FROM sessions WHERE id')) return [{ exists: 1 }];
        if (text.includes('FROM users WHERE id')) return [userRow()];
        if (text.includes('INSERT INTO session_students')) {
          return [
            {
              ...enrollmentJson({ status: 'registered' }),
              session: sessionJson(),
              student: { ...userRow(), created_at: '2024-04-01T08:00:00+00:00', updated_at: '2024-04-01T08:00:00+00:00' },
            },
          ];
        }
        return [];
      });

      const result = await service.enrollStudent({ sessionId: 3, studentId: 5, status: 'registered' });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.enrollment.status).toBe('registered');
        expect(result.enrollment.session?.title).toBe('Algebra review');
        expect(result.enrollment.session?.startDate).toEqual(new Date('2024-05-20T10:00:00.000Z'));
        expect(result.enrollment.student?.email).toBe('student@example.com');
      }
      const insert = client.queries.find((query) => query.text.includes('INSERT'));
      expect(insert?.values).toEqual([3, 5, 'registered', false]);
    });
  });

  describe('findManyByStudentId', () => {
    it("narrows each session to the student's own enrollment", async () => {
      client.onQuery(() => [
        {
          ...sessionJson(),
          start_date: new Date('2024-05-20T10:00:00.000Z'),
          course: null,
          tutor: null,
          students: [enrollmentJson({ id: 7, student_id: 5, attended: true }), enrollmentJson({ id: 8, student_id: 6 })],
        },
      ]);

      const from = new Date('2024-05-01T00:00:00.000Z');
      const to = new Date('2024-05-31T23:59:59.999Z');
      const result = await service.findManyByStudentId(5, { from, to });

      expect(result.totalRecords).toBe(1);
      expect(result.sessions[0].attendance?.id).toBe(7);
      expect(result.sessions[0].attendance?.attended).toBe(true);
      expect(result.sessions[0].students.map((s) => s.id)).toEqual([7]);

      const [query] = client.queries;
      expect(query.values).toEqual([5, from, to]);
      expect(query.text).toContain('s.start_date >= $2');
      expect(query.text).toContain('s.start_date <= $3');
    });
  });

  describe('findMany', () => {
    it('adds the number of enrolled students to each session', async () => {
      client.onQuery(() => [
        { ...sessionJson({ id: 3 }), course: null, tutor: null, students: [enrollmentJson(), enrollmentJson({ id: 8 })] },
        { ...sessionJson({ id: 4 }), course: null, tutor: null, students: [] },
      ]);

      const result = await service.findMany({ limit: 2, excludeUserId: 9 });

      expect(result.totalRecords).toBe(2);
      expect(result.sessions.map((s) => [s.id, s.enrolled])).toEqual([
        [3, 2],
        [4, 0],
      ]);
      expect(client.queries[0].values).toEqual([9, 2]);
    });
  });

  it('propagates failures instead of returning an empty list', async () => {
    client.onQuery(() => {
      throw connectionLost();
    });

    await expect(service.findMany()).rejects.toMatchObject({ category: 'connection' });
    // one repair cycle after the connection-class failure
    expect(client.connectCalls).toBe(2);
  });

  it('returns null when updating the status of a missing session', async () => {
    client.onQuery(() => []);

    await expect(service.updateStatus(99, 'confirmed')).resolves.toBeNull();
    expect(client.queries).toHaveLength(1);
  });
});
