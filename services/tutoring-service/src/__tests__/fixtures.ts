/**
 * Rows shaped the way PostgreSQL returns them: plain columns as driver values,
 * row_to_json() relations with ISO timestamps.
 */

import type { Row } from '@tutoriapp/shared/databases/postgres/rows';

export const createdAt = new Date('2024-04-01T08:00:00.000Z');

export function userRow(overrides: Row = {}): Row {
  return {
    id: 5,
    email: 'student@example.com',
    name: 'Ana',
    second_name: null,
    second_surname: null,
    phone_number: null,
    role: 'user',
    status: true,
    created_at: createdAt,
    updated_at: createdAt,
    ...overrides,
  };
}

export function sessionJson(overrides: Row = {}): Row {
  return {
    id: 3,
    title: 'Algebra review',
    description: null,
    start_date: '2024-05-20T10:00:00+00:00',
    end_date: '2024-05-20T11:30:00+00:00',
    duration: 90,
    seats: 4,
    type: 'online',
    level: 'basic',
    status: 'pending',
    class_room: null,
    tutor_id: 2,
    course_id: 1,
    created_at: '2024-04-01T08:00:00+00:00',
    updated_at: '2024-04-01T08:00:00+00:00',
    ...overrides,
  };
}

export function enrollmentJson(overrides: Row = {}): Row {
  return {
    id: 7,
    session_id: 3,
    student_id: 5,
    status: 'requested',
    attended: false,
    created_at: '2024-04-02T08:00:00+00:00',
    updated_at: '2024-04-02T08:00:00+00:00',
    ...overrides,
  };
}
