import { isDateParam, parseDateParam, toDateRange } from '../dateFilters';

describe('parseDateParam', () => {
  it('parses YYYY-MM-DD as a local calendar day', () => {
    expect(parseDateParam('2024-05-15')).toEqual(new Date(2024, 4, 15));
  });

  it('rejects other layouts and impossible days', () => {
    expect(parseDateParam('2024-5-15')).toBeNull();
    expect(parseDateParam('15/05/2024')).toBeNull();
    expect(parseDateParam('2024-02-30')).toBeNull();
    expect(isDateParam('2024-13-01')).toBe(false);
  });
});

describe('toDateRange', () => {
  it('covers the first day from midnight through the end of the last day', () => {
    expect(toDateRange('2024-05-01', '2024-05-31')).toEqual({
      from: new Date(2024, 4, 1, 0, 0, 0, 0),
      to: new Date(2024, 4, 31, 23, 59, 59, 999),
    });
  });

  it('leaves out bounds that are missing or invalid', () => {
    expect(toDateRange(undefined, '2024-05-31')).toEqual({ to: new Date(2024, 4, 31, 23, 59, 59, 999) });
    expect(toDateRange('not-a-date')).toEqual({});
  });
});
