import { DataSource, Repository } from 'typeorm';
import { Course } from '../../src/models/Course';
import { Offering } from '../../src/models/Offering';
import {
  createCourse,
  deleteCourse,
  findCourse,
  getCourse,
  listCoursesByMajor,
  listCoursesByTerm,
  listMajors,
  updateCourse,
  upsertCourse,
} from '../../src/services/coursesService';
import { addOffering } from '../../src/services/offeringsService';
import { BadRequestError, NotFoundError, UniqueViolationError } from '../../src/utils/errorHandler';
import { createTestDataSource, silenceConsole } from '../helpers/testDataSource';

const STATS = 'Statistics & Data Science';

describe('coursesService', () => {
  let ds: DataSource;

  beforeAll(() => {
    silenceConsole();
  });

  beforeEach(async () => {
    ds = await createTestDataSource();
  });

  afterEach(async () => {
    await ds.destroy();
  });

  describe('createCourse', () => {
    it('should normalize and store the course', async () => {
      const saved = await createCourse(ds, {
        major: '  Statistics   & Data Science ',
        courseCode: ' pstat  120a',
        title: ' PROB & STATISTICS ',
        units: '4.0',
      });

      const course = await getCourse(ds, saved.id);
      expect(course.major).toBe(STATS);
      expect(course.courseCode).toBe('PSTAT 120A');
      expect(course.title).toBe('PROB & STATISTICS');
      expect(course.units).toBe('4.0');
      expect(course.level).toBeNull();
      expect(course.offerings).toEqual([]);
    });

    it('should reject a duplicate major and course code', async () => {
      await createCourse(ds, { major: STATS, courseCode: 'PSTAT 120A', title: 'PROB & STATISTICS' });
      await expect(
        createCourse(ds, { major: STATS, courseCode: 'pstat 120a', title: 'Another title' }),
      ).rejects.toBeInstanceOf(UniqueViolationError);
    });

    it('should allow the same code in another major', async () => {
      await createCourse(ds, { major: STATS, courseCode: 'PSTAT 120A', title: 'PROB & STATISTICS' });
      const other = await createCourse(ds, { major: 'Actuarial Science', courseCode: 'PSTAT 120A', title: 'PROB' });
      expect(other.id).toBeGreaterThan(0);
    });

    it('should require a title', async () => {
      await expect(createCourse(ds, { major: STATS, courseCode: 'PSTAT 120A', title: '   ' })).rejects.toBeInstanceOf(
        BadRequestError,
      );
    });

    it('should canonicalize known levels and reject unknown ones', async () => {
      const saved = await createCourse(ds, {
        major: STATS,
        courseCode: 'PSTAT 120A',
        title: 'PROB & STATISTICS',
        level: 'upper division',
      });
      expect(saved.level).toBe('Upper');

      await expect(
        createCourse(ds, { major: STATS, courseCode: 'PSTAT 120B', title: 'PROB', level: 'Sophomore' }),
      ).rejects.toThrow('Unknown course level "Sophomore"');
    });
  });

  describe('upsertCourse', () => {
    it('should update the existing row and keep fields that were not given', async () => {
      const first = await upsertCourse(ds, {
        major: STATS,
        courseCode: 'PSTAT 120A',
        title: 'PROB & STATS',
        units: '4.0',
      });
      const second = await upsertCourse(ds, {
        major: STATS,
        courseCode: 'PSTAT 120A',
        title: 'PROB & STATISTICS',
        description: 'Probability theory.',
      });

      expect(second.id).toBe(first.id);
      const course = await getCourse(ds, first.id);
      expect(course.title).toBe('PROB & STATISTICS');
      expect(course.units).toBe('4.0');
      expect(course.description).toBe('Probability theory.');
      expect(await listMajors(ds)).toEqual([STATS]);
    });

    it('should update the row a concurrent insert created instead of failing', async () => {
      const first = await upsertCourse(ds, { major: STATS, courseCode: 'PSTAT 120A', title: 'PROB' });
      // the lookup misses as if the other insert had not committed yet
      const findOne = jest.spyOn(Repository.prototype, 'findOne').mockResolvedValueOnce(null);

      try {
        const second = await upsertCourse(ds, { major: STATS, courseCode: 'PSTAT 120A', title: 'PROB & STATISTICS' });
        expect(second.id).toBe(first.id);
      } finally {
        findOne.mockRestore();
      }

      expect(await ds.getRepository(Course).count()).toBe(1);
      expect((await getCourse(ds, first.id)).title).toBe('PROB & STATISTICS');
    });
  });

  describe('lookups', () => {
    beforeEach(async () => {
      await createCourse(ds, { major: 'Mathematics', courseCode: 'MATH 4A', title: 'LINEAR ALGEBRA' });
      await createCourse(ds, { major: 'Economics', courseCode: 'ECON 1', title: 'MICRO' });
      await createCourse(ds, { major: 'Mathematics', courseCode: 'MATH 3A', title: 'CALCULUS' });
    });

    it('should find a course by normalized major and code', async () => {
      const course = await findCourse(ds, ' Mathematics ', 'math 4a');
      expect(course?.title).toBe('LINEAR ALGEBRA');
      expect(await findCourse(ds, 'Mathematics', 'MATH 999')).toBeNull();
    });

    it('should list distinct majors in order', async () => {
      expect(await listMajors(ds)).toEqual(['Economics', 'Mathematics']);
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(getCourse(ds, 999)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('listing by major and term', () => {
    let a: number;
    let b: number;

    beforeEach(async () => {
      a = (await createCourse(ds, { major: STATS, courseCode: 'PSTAT 120A', title: 'PROB A' })).id;
      b = (await createCourse(ds, { major: STATS, courseCode: 'PSTAT 5A', title: 'DATA' })).id;
      await createCourse(ds, { major: STATS, courseCode: 'PSTAT 126', title: 'REGRESSION' });
      await createCourse(ds, { major: 'Mathematics', courseCode: 'MATH 3A', title: 'CALCULUS' });

      await addOffering(ds, { courseId: a, quarter: 'Fall', year: '2026', status: 'Open' });
      await addOffering(ds, { courseId: a, quarter: 'Winter', year: '2026', status: 'Open' });
      await addOffering(ds, { courseId: a, quarter: 'Spring', year: '2026', status: 'Full' });
      await addOffering(ds, { courseId: b, quarter: 'Spring', year: '2026', status: 'Mixed' });
    });

    it('should list the courses of a major with offerings in term order', async () => {
      const courses = await listCoursesByMajor(ds, STATS);
      expect(courses.map((c) => c.courseCode)).toEqual(['PSTAT 120A', 'PSTAT 126', 'PSTAT 5A']);
      expect(courses[0].offerings?.map((o) => o.quarter)).toEqual(['Winter', 'Spring', 'Fall']);
      expect(courses[1].offerings).toEqual([]);
    });

    it('should list only courses offered in the term, with only that term', async () => {
      const spring = await listCoursesByTerm(ds, STATS, 'spring', '2026');
      expect(spring.map((c) => c.courseCode)).toEqual(['PSTAT 120A', 'PSTAT 5A']);
      expect(spring.map((c) => c.offerings?.map((o) => o.status))).toEqual([['Full'], ['Mixed']]);

      const winter = await listCoursesByTerm(ds, STATS, 'Winter');
      expect(winter.map((c) => c.courseCode)).toEqual(['PSTAT 120A']);

      expect(await listCoursesByTerm(ds, STATS, 'Winter', 2025)).toEqual([]);
    });

    it('should reject an unknown quarter', async () => {
      await expect(listCoursesByTerm(ds, STATS, 'Autumn')).rejects.toThrow('Unknown quarter "Autumn"');
    });
  });

  describe('updateCourse', () => {
    it('should apply partial changes', async () => {
      const saved = await createCourse(ds, { major: STATS, courseCode: 'PSTAT 120A', title: 'PROB', units: '4.0' });
      await updateCourse(ds, saved.id, { title: 'PROB & STATISTICS', prerequisites: 'MATH 4A' });

      const course = await getCourse(ds, saved.id);
      expect(course.title).toBe('PROB & STATISTICS');
      expect(course.prerequisites).toBe('MATH 4A');
      expect(course.units).toBe('4.0');
    });

    it('should refuse to rename a course onto an existing code', async () => {
      await createCourse(ds, { major: STATS, courseCode: 'PSTAT 120A', title: 'PROB A' });
      const b = await createCourse(ds, { major: STATS, courseCode: 'PSTAT 120B', title: 'PROB B' });
      await expect(updateCourse(ds, b.id, { courseCode: 'PSTAT 120A' })).rejects.toBeInstanceOf(UniqueViolationError);
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(updateCourse(ds, 42, { title: 'X' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('deleteCourse', () => {
    it('should remove the course and cascade to its offerings', async () => {
      const course = await createCourse(ds, { major: STATS, courseCode: 'PSTAT 120A', title: 'PROB' });
      const other = await createCourse(ds, { major: STATS, courseCode: 'PSTAT 120B', title: 'PROB B' });
      await addOffering(ds, { courseId: course.id, quarter: 'Winter', year: '2026' });
      await addOffering(ds, { courseId: course.id, quarter: 'Spring', year: '2026' });
      await addOffering(ds, { courseId: other.id, quarter: 'Spring', year: '2026' });

      expect(await deleteCourse(ds, course.id)).toBe(2);

      const remaining = await ds.getRepository(Offering).find();
      expect(remaining.map((o) => o.courseId)).toEqual([other.id]);
      await expect(getCourse(ds, course.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(deleteCourse(ds, 7)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject an invalid id before querying', async () => {
      await createCourse(ds, { major: STATS, courseCode: 'PSTAT 120A', title: 'PROB' });
      await expect(deleteCourse(ds, 0)).rejects.toBeInstanceOf(BadRequestError);
      await expect(updateCourse(ds, -1, { title: 'X' })).rejects.toBeInstanceOf(BadRequestError);
      expect(await ds.getRepository(Course).count()).toBe(1);
    });
  });
});
