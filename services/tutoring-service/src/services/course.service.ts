/**
 * Course Service - Business Logic Layer
 */

import { logDatabaseOperation } from '@tutoriapp/shared/config/logger';
import type { UnitRunner } from '@tutoriapp/shared/databases/postgres/runtime';
import {
  CourseRepository,
  type Course,
  type CourseCreateInput,
  type CourseFilters,
  type CourseUpdateInput,
} from '../models/course.model';

export class CourseService {
  constructor(private database: UnitRunner) {}

  async findOne(id: number): Promise<Course | null> {
    return this.database.run((client) => new CourseRepository(client).findById(id));
  }

  async findMany(filters: CourseFilters = {}): Promise<{ totalRecords: number; courses: Course[] }> {
    const courses = await this.database.run((client) => new CourseRepository(client).findMany(filters));
    return { totalRecords: courses.length, courses };
  }

  async create(data: CourseCreateInput): Promise<Course> {
    const course = await this.database.run((client) => new CourseRepository(client).create(data));
    logDatabaseOperation('insert', 'courses', { courseId: course.id });
    return course;
  }

  async update(id: number, data: CourseUpdateInput): Promise<Course | null> {
    return this.database.run((client) => new CourseRepository(client).update(id, data));
  }

  async updateStatus(id: number, status: boolean): Promise<Course | null> {
    return this.update(id, { status });
  }
}
