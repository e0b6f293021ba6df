import { containsPattern, QueryConditions } from '../sql';

describe('containsPattern', () => {
  it('wraps the search term in wildcards', () => {
    expect(containsPattern('math')).toBe('%math%');
  });

  it('escapes LIKE wildcards and the escape character', () => {
    expect(containsPattern('100%_a\\b')).toBe('%100\\%\\_a\\\\b%');
  });
});

describe('QueryConditions', () => {
  it('numbers placeholders in registration order', () => {
    const where = new QueryConditions();
    where.add(`role = ${where.param('admin')}`).add(`status = ${where.param(true)}`);

    expect(where.whereClause).toBe('WHERE role = $1 AND status = $2');
    expect(where.values).toEqual(['admin', true]);
  });

  it('produces no WHERE clause without conditions', () => {
    const where = new QueryConditions();
    const limit = where.param(10);

    expect(limit).toBe('$1');
    expect(where.whereClause).toBe('');
  });
});
