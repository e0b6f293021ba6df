/**
 * Dashboard statistics for students and tutors.
 * Pure functions over the activity rows loaded by the repositories.
 */

import { endOfDay, endOfMonth, isWithinInterval, startOfDay, startOfMonth } from 'date-fns';
import type { TutorSessionActivity } from '../models/session.model';
import type { EnrollmentActivity } from '../models/sessionStudent.model';

export interface StudentStats {
  confirmedSessions: number;
  pendingSessions: number;
  monthSessions: number;
  nextSession: { courseName: string | null; startDate: string } | null;
  totalHoursAttended: number;
  averageHoursRegistered: number;
}

export interface StudentStatsHistory {
  attendedSessions: number;
  totalHoursAttended: number;
  attendanceRate: number;
  unattendedSessions: number;
}

export interface TutorStats {
  totalStudents: number;
  todaySessions: number;
  totalTutoringSessions: number;
  completedSessionsPercentage: number;
  averageDurationPerSession: number;
  averageOccupancyByCourse: number;
  nextSession: { title: string | null; startDate: string } | null;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function hours(minutes: number | null): number {
  return minutes ? minutes / 60 : 0;
}

function percentage(part: number, total: number): number {
  return total > 0 ? round2((part / total) * 100) : 0;
}

function earliestAfter<T>(items: T[], startOf: (item: T) => Date | null, now: Date): { item: T; startDate: Date } | null {
  let best: { item: T; startDate: Date } | null = null;
  for (const item of items) {
    const startDate = startOf(item);
    if (startDate && startDate > now && (!best || startDate < best.startDate)) {
      best = { item, startDate };
    }
  }
  return best;
}

export function computeStudentStats(enrollments: EnrollmentActivity[], now: Date): StudentStats {
  const upcomingRegistered = enrollments.filter(
    (e) => e.status === 'registered' && e.session.startDate !== null && e.session.startDate >= now
  );
  const month = { start: startOfMonth(now), end: endOfMonth(now) };

  const next = earliestAfter(enrollments, (e) => e.session.startDate, now);

  const registeredWithDuration = enrollments.filter((e) => e.status === 'registered' && e.session.duration);
  const registeredHours = registeredWithDuration.reduce((sum, e) => sum + hours(e.session.duration), 0);

  return {
    confirmedSessions: upcomingRegistered.filter((e) => e.session.status === 'confirmed').length,
    pendingSessions: upcomingRegistered.filter((e) => e.session.status === 'pending').length,
    monthSessions: enrollments.filter((e) => isWithinInterval(e.createdAt, month)).length,
    nextSession: next
      ? { courseName: next.item.session.courseName, startDate: next.startDate.toISOString() }
      : null,
    totalHoursAttended: round2(
      enrollments.filter((e) => e.attended).reduce((sum, e) => sum + hours(e.session.duration), 0)
    ),
    averageHoursRegistered:
      registeredWithDuration.length > 0 ? round2(registeredHours / registeredWithDuration.length) : 0,
  };
}

/**
 * Statistics over enrollments whose session started before now.
 */
export function computeStudentStatsHistory(enrollments: EnrollmentActivity[], now: Date): StudentStatsHistory {
  const past = enrollments.filter((e) => e.session.startDate !== null && e.session.startDate < now);
  const attended = past.filter((e) => e.attended);

  return {
    attendedSessions: attended.length,
    totalHoursAttended: round2(attended.reduce((sum, e) => sum + hours(e.session.duration), 0)),
    attendanceRate: percentage(attended.length, past.length),
    unattendedSessions: past.filter((e) => e.status === 'absent').length,
  };
}

export function computeTutorStats(sessions: TutorSessionActivity[], now: Date): TutorStats {
  const total = sessions.length;
  const today = { start: startOfDay(now), end: endOfDay(now) };

  const students = new Set<number>();
  for (const session of sessions) {
    session.studentIds.forEach((id) => students.add(id));
  }

  const completed = sessions.filter(
    (s) => s.status === 'confirmed' || (s.startDate !== null && s.startDate < now)
  ).length;

  const totalDuration = sessions.reduce((sum, s) => sum + (s.duration || 0), 0);

  // a session without a seat count is treated as having one seat
  const occupancies = sessions.map((s) => {
    const seats = s.seats || 1;
    return seats > 0 ? (s.studentIds.length / seats) * 100 : 0;
  });

  const next = earliestAfter(sessions, (s) => s.startDate, now);

  return {
    totalStudents: students.size,
    todaySessions: sessions.filter((s) => s.startDate !== null && isWithinInterval(s.startDate, today)).length,
    totalTutoringSessions: total,
    completedSessionsPercentage: percentage(completed, total),
    averageDurationPerSession: total > 0 ? round2(totalDuration / total) : 0,
    averageOccupancyByCourse:
      occupancies.length > 0 ? round2(occupancies.reduce((sum, value) => sum + value, 0) / occupancies.length) : 0,
    nextSession: next ? { title: next.item.title, startDate: next.startDate.toISOString() } : null,
  };
}
