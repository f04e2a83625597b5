import { DataSource, FindOptionsWhere, IsNull } from 'typeorm';
import { Offering } from '../models/Offering';
import { blankToNull } from '../utils/dbHelpers';
import { BadRequestError, NotFoundError, withDbErrors } from '../utils/errorHandler';
import {
  compareTerms,
  normalizeStatus,
  parseQuarter,
  parseYear,
  TermFilter,
  validateEmail,
  validateId,
} from '../utils/validation';

export interface OfferingInput {
  courseId: number;
  quarter: string;
  year?: string | number | null;
  status?: string | null;
  notes?: string | null;
  instructorName?: string | null;
  instructorEmail?: string | null;
  meetingPattern?: string | null;
}

export type OfferingChanges = Partial<Omit<OfferingInput, 'courseId'>>;

type OfferingFields = Partial<Omit<Offering, 'id' | 'course'>>;

export function buildOfferingFields(input: OfferingChanges): OfferingFields {
  const fields: OfferingFields = {};

  if (input.quarter !== undefined) fields.quarter = parseQuarter(input.quarter);
  if (input.year !== undefined) fields.year = parseYear(input.year);
  if (input.status !== undefined) {
    const status = blankToNull(input.status);
    fields.status = status === null ? null : normalizeStatus(status);
  }
  if (input.instructorEmail !== undefined) {
    const email = blankToNull(input.instructorEmail);
    if (email !== null && !validateEmail(email)) {
      throw new BadRequestError(`Invalid instructor email "${email}"`);
    }
    fields.instructorEmail = email;
  }
  if (input.notes !== undefined) fields.notes = blankToNull(input.notes);
  if (input.instructorName !== undefined) fields.instructorName = blankToNull(input.instructorName);
  if (input.meetingPattern !== undefined) fields.meetingPattern = blankToNull(input.meetingPattern);
  return fields;
}

function termWhere(filter: TermFilter): FindOptionsWhere<Offering> {
  const where: FindOptionsWhere<Offering> = {};
  if (filter.quarter !== undefined) where.quarter = parseQuarter(filter.quarter);
  if (filter.year !== undefined) {
    const year = parseYear(filter.year);
    where.year = year === null ? IsNull() : year;
  }
  return where;
}

function requireId(id: number, label: string): number {
  if (!validateId(id)) throw new BadRequestError(`Invalid ${label} id: ${id}`);
  return id;
}

function byTerm(a: Offering, b: Offering): number {
  return compareTerms(a, b) || a.id - b.id;
}

/** The course must exist; the engine rejects an unknown course_id. */
export async function addOffering(ds: DataSource, input: OfferingInput): Promise<Offering> {
  requireId(input.courseId, 'course');
  if (typeof input.quarter !== 'string') throw new BadRequestError('Offering quarter is required');

  const repo = ds.getRepository(Offering);
  const offering = repo.create({ ...buildOfferingFields(input), courseId: input.courseId });
  return withDbErrors('Failed to create offering', () => repo.save(offering));
}

/**
 * Updates the offering of the same course, quarter and year if there is one,
 * otherwise adds it.
 */
export async function upsertOffering(ds: DataSource, input: OfferingInput): Promise<Offering> {
  requireId(input.courseId, 'course');
  const fields = buildOfferingFields(input);
  const quarter = fields.quarter;
  if (quarter === undefined) throw new BadRequestError('Offering quarter is required');
  const year = fields.year ?? null;

  return withDbErrors('Failed to upsert offering', () =>
    ds.transaction(async (manager) => {
      const repo = manager.getRepository(Offering);
      const existing = await repo.findOne({
        where: { courseId: input.courseId, quarter, year: year === null ? IsNull() : year },
      });
      if (existing) {
        Object.assign(existing, fields);
        return repo.save(existing);
      }
      return repo.save(repo.create({ ...fields, courseId: input.courseId }));
    }),
  );
}

export async function getOffering(ds: DataSource, id: number): Promise<Offering> {
  requireId(id, 'offering');
  const offering = await ds.getRepository(Offering).findOne({
    where: { id },
    relations: { course: true },
  });
  if (!offering) throw new NotFoundError(`Offering ${id} not found`);
  return offering;
}

export async function listOfferingsForCourse(
  ds: DataSource,
  courseId: number,
  filter: TermFilter = {},
): Promise<Offering[]> {
  requireId(courseId, 'course');
  const offerings = await ds.getRepository(Offering).find({
    where: { ...termWhere(filter), courseId },
  });
  return offerings.sort(byTerm);
}

/** Every scheduled course in a term, grouped by major then course code. */
export async function listOfferingsForTerm(
  ds: DataSource,
  quarter: string,
  year?: string | number | null,
): Promise<Offering[]> {
  const offerings = await ds.getRepository(Offering).find({
    where: termWhere({ quarter, year }),
    relations: { course: true },
  });

  const key = (o: Offering) => `${o.course?.major ?? ''}\u0000${o.course?.courseCode ?? ''}`;
  return offerings.sort((a, b) => {
    const ka = key(a);
    const kb = key(b);
    if (ka !== kb) return ka < kb ? -1 : 1;
    return byTerm(a, b);
  });
}

export async function updateOffering(ds: DataSource, id: number, changes: OfferingChanges): Promise<Offering> {
  requireId(id, 'offering');
  const repo = ds.getRepository(Offering);
  const offering = await repo.findOne({ where: { id } });
  if (!offering) throw new NotFoundError(`Offering ${id} not found`);

  Object.assign(offering, buildOfferingFields(changes));
  return withDbErrors('Failed to update offering', () => repo.save(offering));
}

export async function deleteOffering(ds: DataSource, id: number): Promise<void> {
  requireId(id, 'offering');
  const repo = ds.getRepository(Offering);
  const offering = await repo.findOne({ where: { id } });
  if (!offering) throw new NotFoundError(`Offering ${id} not found`);
  await repo.remove(offering);
}
