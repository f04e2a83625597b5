import { DataSource } from 'typeorm';
import { Course } from '../models/Course';
import { Offering } from '../models/Offering';
import { blankToNull } from '../utils/dbHelpers';
import { BadRequestError, NotFoundError, retryOnConflict, withDbErrors } from '../utils/errorHandler';
import {
  compareTerms,
  normalizeCourseCode,
  normalizeLevel,
  normalizeMajor,
  parseQuarter,
  parseYear,
  validateId,
} from '../utils/validation';

export interface CourseInput {
  major: string;
  courseCode: string;
  title: string;
  units?: string | null;
  level?: string | null;
  description?: string | null;
  prerequisites?: string | null;
  additionalInfo?: string | null;
  catalogUrl?: string | null;
}

export type CourseChanges = Partial<CourseInput>;

type CourseFields = Partial<Omit<Course, 'id' | 'offerings'>>;

const OPTIONAL_TEXT = ['units', 'description', 'prerequisites', 'additionalInfo', 'catalogUrl'] as const;

// Only keys present in the input end up in the result, so partial updates
// leave the other columns alone.
function buildCourseFields(input: CourseChanges): CourseFields {
  const fields: CourseFields = {};

  if (input.major !== undefined) {
    fields.major = normalizeMajor(input.major);
    if (!fields.major) throw new BadRequestError('Course major is required');
  }
  if (input.courseCode !== undefined) {
    fields.courseCode = normalizeCourseCode(input.courseCode);
    if (!fields.courseCode) throw new BadRequestError('Course code is required');
  }
  if (input.title !== undefined) {
    fields.title = input.title.trim();
    if (!fields.title) throw new BadRequestError('Course title is required');
  }
  if (input.level !== undefined) {
    const raw = blankToNull(input.level);
    const level = raw === null ? null : normalizeLevel(raw);
    if (raw !== null && level === null) {
      throw new BadRequestError(`Unknown course level "${raw}"`);
    }
    fields.level = level;
  }
  for (const key of OPTIONAL_TEXT) {
    const value = input[key];
    if (value !== undefined) fields[key] = blankToNull(value);
  }
  return fields;
}

function requireCourseInput(input: CourseInput): CourseFields {
  if (typeof input.major !== 'string' || typeof input.courseCode !== 'string' || typeof input.title !== 'string') {
    throw new BadRequestError('Course major, code and title are required');
  }
  return buildCourseFields(input);
}

function sortOfferings(course: Course): Course {
  course.offerings?.sort((a, b) => compareTerms(a, b) || a.id - b.id);
  return course;
}

export async function createCourse(ds: DataSource, input: CourseInput): Promise<Course> {
  const repo = ds.getRepository(Course);
  const course = repo.create(requireCourseInput(input));
  const saved = await withDbErrors('Failed to create course', () => repo.save(course));
  console.log(`✅ Course created: ${saved.major} / ${saved.courseCode} - ${saved.title}`);
  return saved;
}

/**
 * Inserts the course or, when (major, course_code) already exists, updates
 * that row with the fields given in the input.
 */
export async function upsertCourse(ds: DataSource, input: CourseInput): Promise<Course> {
  const fields = requireCourseInput(input);

  return retryOnConflict(() =>
    withDbErrors('Failed to upsert course', () =>
      ds.transaction(async (manager) => {
        const repo = manager.getRepository(Course);
        const existing = await repo.findOne({
          where: { major: fields.major, courseCode: fields.courseCode },
        });
        if (existing) {
          Object.assign(existing, fields);
          return repo.save(existing);
        }
        return repo.save(repo.create(fields));
      }),
    ),
  );
}

function requireCourseId(id: number): number {
  if (!validateId(id)) throw new BadRequestError(`Invalid course id: ${id}`);
  return id;
}

export async function getCourse(ds: DataSource, id: number): Promise<Course> {
  requireCourseId(id);

  const course = await ds.getRepository(Course).findOne({
    where: { id },
    relations: { offerings: true },
  });
  if (!course) throw new NotFoundError(`Course ${id} not found`);
  return sortOfferings(course);
}

export async function findCourse(ds: DataSource, major: string, courseCode: string): Promise<Course | null> {
  return ds.getRepository(Course).findOne({
    where: { major: normalizeMajor(major), courseCode: normalizeCourseCode(courseCode) },
  });
}

export async function listMajors(ds: DataSource): Promise<string[]> {
  const rows = await ds.getRepository(Course).find({
    select: { major: true },
    order: { major: 'ASC' },
  });
  return [...new Set(rows.map((r) => r.major))];
}

export async function listCoursesByMajor(ds: DataSource, major: string): Promise<Course[]> {
  const courses = await ds.getRepository(Course).find({
    where: { major: normalizeMajor(major) },
    relations: { offerings: true },
    order: { courseCode: 'ASC' },
  });
  return courses.map(sortOfferings);
}

/**
 * Courses of a major scheduled in the given quarter (and year, when given).
 * Each course carries only its offerings for that term.
 */
export async function listCoursesByTerm(
  ds: DataSource,
  major: string,
  quarter: string,
  year?: string | number,
): Promise<Course[]> {
  const q = parseQuarter(quarter);

  let condition = 'offering.quarter = :quarter';
  const params: Record<string, string> = { quarter: q };
  if (year !== undefined) {
    const y = parseYear(year);
    if (!y) throw new BadRequestError(`Invalid year "${year}"`);
    condition += ' AND offering.year = :year';
    params.year = y;
  }

  return ds
    .getRepository(Course)
    .createQueryBuilder('course')
    .innerJoinAndSelect('course.offerings', 'offering', condition, params)
    .where('course.major = :major', { major: normalizeMajor(major) })
    .orderBy('course.courseCode', 'ASC')
    .addOrderBy('offering.id', 'ASC')
    .getMany();
}

export async function updateCourse(ds: DataSource, id: number, changes: CourseChanges): Promise<Course> {
  requireCourseId(id);
  const repo = ds.getRepository(Course);
  const course = await repo.findOne({ where: { id } });
  if (!course) throw new NotFoundError(`Course ${id} not found`);

  Object.assign(course, buildCourseFields(changes));
  return withDbErrors('Failed to update course', () => repo.save(course));
}

/** Deletes the course; its offerings go with it. Returns how many offerings were removed. */
export async function deleteCourse(ds: DataSource, id: number): Promise<number> {
  requireCourseId(id);
  return ds.transaction(async (manager) => {
    const repo = manager.getRepository(Course);
    const course = await repo.findOne({ where: { id } });
    if (!course) throw new NotFoundError(`Course ${id} not found`);

    const offerings = await manager.getRepository(Offering).count({ where: { courseId: id } });
    await repo.delete(id);
    console.log(`🗑️  Course deleted: ${course.courseCode} (${offerings} offerings)`);
    return offerings;
  });
}
