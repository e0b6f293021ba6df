/**
 * Dashboard statistics
 * Dates are local time, matching the day / month bounds the calculations use
 */

import type { TutorSessionActivity } from '../../models/session.model';
import type { EnrollmentActivity } from '../../models/sessionStudent.model';
import { computeStudentStats, computeStudentStatsHistory, computeTutorStats, round2 } from '../sessionStats';

const now = new Date(2024, 4, 15, 12, 0);

const enrollments: EnrollmentActivity[] = [
  {
    status: 'registered',
    attended: false,
    createdAt: new Date(2024, 4, 2),
    session: { startDate: new Date(2024, 4, 20, 10, 0), status: 'confirmed', duration: 90, courseName: 'Algebra' },
  },
  {
    status: 'registered',
    attended: false,
    createdAt: new Date(2024, 4, 10),
    session: { startDate: new Date(2024, 4, 18, 9, 0), status: 'pending', duration: 60, courseName: 'Physics' },
  },
  {
    status: 'attended',
    attended: true,
    createdAt: new Date(2024, 3, 20),
    session: { startDate: new Date(2024, 4, 1, 10, 0), status: 'confirmed', duration: 120, courseName: 'Algebra' },
  },
  {
    status: 'absent',
    attended: false,
    createdAt: new Date(2024, 3, 25),
    session: { startDate: new Date(2024, 4, 5, 10, 0), status: 'confirmed', duration: 60, courseName: 'Chemistry' },
  },
];

describe('round2', () => {
  it('rounds to two decimals', () => {
    expect(round2(1 / 3)).toBe(0.33);
    expect(round2(2.5)).toBe(2.5);
  });
});

describe('computeStudentStats', () => {
  it('summarizes upcoming and attended sessions', () => {
    expect(computeStudentStats(enrollments, now)).toEqual({
      confirmedSessions: 1,
      pendingSessions: 1,
      monthSessions: 2,
      nextSession: { courseName: 'Physics', startDate: new Date(2024, 4, 18, 9, 0).toISOString() },
      totalHoursAttended: 2,
      averageHoursRegistered: 1.25,
    });
  });

  it('returns zeros and no next session for a student without enrollments', () => {
    expect(computeStudentStats([], now)).toEqual({
      confirmedSessions: 0,
      pendingSessions: 0,
      monthSessions: 0,
      nextSession: null,
      totalHoursAttended: 0,
      averageHoursRegistered: 0,
    });
  });
});

describe('computeStudentStatsHistory', () => {
  it('only counts sessions that already started', () => {
    expect(computeStudentStatsHistory(enrollments, now)).toEqual({
      attendedSessions: 1,
      totalHoursAttended: 2,
      attendanceRate: 50,
      unattendedSessions: 1,
    });
  });

  it('reports a zero attendance rate when there is no history', () => {
    expect(computeStudentStatsHistory([], now).attendanceRate).toBe(0);
  });
});

describe('computeTutorStats', () => {
  const sessions: TutorSessionActivity[] = [
    {
      title: 'Algebra review',
      startDate: new Date(2024, 4, 15, 9, 0),
      duration: 60,
      seats: 4,
      status: 'pending',
      studentIds: [1, 2],
    },
    {
      title: 'Physics lab',
      startDate: new Date(2024, 4, 15, 18, 0),
      duration: 90,
      seats: 2,
      status: 'confirmed',
      studentIds: [2],
    },
    {
      title: 'Chemistry',
      startDate: new Date(2024, 4, 20, 10, 0),
      duration: 30,
      seats: null,
      status: 'pending',
      studentIds: [3],
    },
    { title: null, startDate: null, duration: null, seats: 5, status: 'cancelled', studentIds: [] },
  ];

  it('summarizes sessions, students and occupancy', () => {
    expect(computeTutorStats(sessions, now)).toEqual({
      totalStudents: 3,
      todaySessions: 2,
      totalTutoringSessions: 4,
      completedSessionsPercentage: 50,
      averageDurationPerSession: 45,
      averageOccupancyByCourse: 50,
      nextSession: { title: 'Physics lab', startDate: new Date(2024, 4, 15, 18, 0).toISOString() },
    });
  });

  it('returns zeros for a tutor without sessions', () => {
    expect(computeTutorStats([], now)).toEqual({
      totalStudents: 0,
      todaySessions: 0,
      totalTutoringSessions: 0,
      completedSessionsPercentage: 0,
      averageDurationPerSession: 0,
      averageOccupancyByCourse: 0,
      nextSession: null,
    });
  });
});
