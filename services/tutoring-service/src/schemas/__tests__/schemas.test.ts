import { listCoursesQuerySchema } from '../course.schema';
import { listSessionsQuerySchema } from '../session.schema';
import { listUsersQuerySchema } from '../user.schema';

describe('query schemas', () => {
  it('reads course status flags written as words or digits', () => {
    expect(listCoursesQuerySchema.parse({ status: 'YES', semester: '3' })).toEqual({ status: true, semester: 3 });
    expect(listCoursesQuerySchema.parse({ status: '0' })).toEqual({ status: false });
    expect(listCoursesQuerySchema.safeParse({ status: 'maybe' }).success).toBe(false);
  });

  it('only accepts true/1/false/0 for the user status flag', () => {
    expect(listUsersQuerySchema.parse({ status: '1', role: 'admin' })).toEqual({ status: true, role: 'admin' });
    expect(listUsersQuerySchema.safeParse({ status: 'yes' }).success).toBe(false);
  });

  it('drops a blank search term', () => {
    expect(listUsersQuerySchema.parse({ search: '   ' })).toEqual({});
  });

  it('validates session list dates and numeric options', () => {
    expect(
      listSessionsQuerySchema.parse({ start_date: '2024-05-01', limit: '5', exclude_user_id: '9', level: 'basic' })
    ).toEqual({ start_date: '2024-05-01', limit: 5, exclude_user_id: 9, level: 'basic' });

    const invalid = listSessionsQuerySchema.safeParse({ end_date: '05/31/2024' });
    expect(invalid.success).toBe(false);
    if (!invalid.success) {
      expect(invalid.error.errors[0]).toMatchObject({
        path: ['end_date'],
        message: 'Invalid end_date format, expected YYYY-MM-DD',
      });
    }
  });
});
