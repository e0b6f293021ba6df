import { DatabaseRuntime } from '@tutoriapp/shared/databases/postgres/runtime';
import { FakeDatabaseClient, silentLogger } from '@tutoriapp/shared/testing/fakeDatabaseClient';
import { createdAt } from '../../__tests__/fixtures';
import { CourseService } from '../course.service';

function courseRow(id: number, name: string) {
  return {
    id,
    code: null,
    name,
    description: `${name} for first year students`,
    semester: 1,
    status: true,
    created_at: createdAt,
    updated_at: createdAt,
  };
}

describe('CourseService', () => {
  let client: FakeDatabaseClient;
  let runtime: DatabaseRuntime<FakeDatabaseClient>;
  let service: CourseService;

  beforeEach(() => {
    client = new FakeDatabaseClient();
    runtime = new DatabaseRuntime(client, { logger: silentLogger });
    service = new CourseService(runtime);
  });

  afterEach(async () => {
    await runtime.close();
  });

  it('searches name, description and code', async () => {
    client.onQuery(() => [courseRow(1, 'Algebra')]);

    const result = await service.findMany({ semester: 1, search: 'alg' });

    expect(result).toMatchObject({ totalRecords: 1, courses: [{ id: 1, code: null, name: 'Algebra' }] });
    expect(client.queries[0].text).toContain(
      'WHERE semester = $1 AND (name ILIKE $2 OR description ILIKE $2 OR code ILIKE $2)'
    );
    expect(client.queries[0].values).toEqual([1, '%alg%']);
  });

  it('creates courses active by default', async () => {
    client.onQuery(() => [courseRow(2, 'Physics')]);

    await service.create({ name: 'Physics', description: 'Physics for first year students', semester: 1 });

    expect(client.queries[0].values).toEqual([null, 'Physics', 'Physics for first year students', 1, true]);
  });

  it('changes only the status column', async () => {
    client.onQuery(() => [{ ...courseRow(2, 'Physics'), status: false }]);

    const course = await service.updateStatus(2, false);

    expect(course?.status).toBe(false);
    expect(client.queries[0].values).toEqual([false, 2]);
    expect(client.queries[0].text).toContain('WHERE id = $2');
  });
});
