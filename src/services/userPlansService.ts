import { DataSource, FindOptionsWhere, In, IsNull } from 'typeorm';
import { Course } from '../models/Course';
import { UserPlan } from '../models/UserPlan';
import { blankToNull } from '../utils/dbHelpers';
import { BadRequestError, NotFoundError, withDbErrors } from '../utils/errorHandler';
import {
  compareTerms,
  normalizeCourseCode,
  normalizePlanType,
  parseQuarter,
  parseYear,
  TermFilter,
  validateId,
  validateUnits,
} from '../utils/validation';

export interface PlanTerm {
  quarter: string;
  year?: string | number | null;
}

export interface PlanEntryInput extends PlanTerm {
  userId: string;
  courseCode: string;
  units?: number | null;
  type?: string | null;
}

export type PlanEntryChanges = Partial<Omit<PlanEntryInput, 'userId'>>;

export type PlanLoad = 'under' | 'light' | 'typical' | 'heavy';

export interface TermSummary {
  userId: string;
  quarter: string;
  year: string | null;
  entries: number;
  totalUnits: number;
  load: PlanLoad;
  requiresApproval: boolean;
}

export interface PlanEntryWithCatalog {
  entry: UserPlan;
  // empty when the plan names a code the catalog does not carry
  courses: Course[];
}

type PlanFields = Partial<Omit<UserPlan, 'id' | 'userId' | 'createdAt'>>;

function parseUserId(userId: string): string {
  const id = typeof userId === 'string' ? userId.trim() : '';
  if (!id) throw new BadRequestError('User id is required');
  return id;
}

function buildPlanFields(input: PlanEntryChanges): PlanFields {
  const fields: PlanFields = {};

  if (input.quarter !== undefined) fields.quarter = parseQuarter(input.quarter);
  if (input.year !== undefined) fields.year = parseYear(input.year);
  if (input.courseCode !== undefined) {
    fields.courseCode = normalizeCourseCode(input.courseCode);
    if (!fields.courseCode) throw new BadRequestError('Course code is required');
  }
  if (input.units !== undefined) {
    if (input.units !== null && !validateUnits(input.units)) {
      throw new BadRequestError(`Units must be a non-negative integer, got ${input.units}`);
    }
    fields.units = input.units;
  }
  if (input.type !== undefined) {
    const type = blankToNull(input.type);
    fields.type = type === null ? null : normalizePlanType(type);
  }
  return fields;
}

// year undefined matches every year, null matches entries saved without one
function planWhere(userId: string, term?: TermFilter): FindOptionsWhere<UserPlan> {
  const where: FindOptionsWhere<UserPlan> = { userId: parseUserId(userId) };
  if (term?.quarter !== undefined) where.quarter = parseQuarter(term.quarter);
  if (term?.year !== undefined) {
    const year = parseYear(term.year);
    where.year = year === null ? IsNull() : year;
  }
  return where;
}

// clearTerm and summarizeTerm act on one term: a missing year means the year-less term
function exactTerm(term: PlanTerm): TermFilter {
  return { quarter: term.quarter, year: term.year ?? null };
}

async function findOwnedEntry(ds: DataSource, userId: string, id: number): Promise<UserPlan> {
  if (!validateId(id)) throw new BadRequestError(`Invalid plan entry id: ${id}`);
  const entry = await ds.getRepository(UserPlan).findOne({ where: { id, userId: parseUserId(userId) } });
  if (!entry) throw new NotFoundError(`Plan entry ${id} not found`);
  return entry;
}

export function classifyLoad(totalUnits: number): PlanLoad {
  if (totalUnits < 12) return 'under';
  if (totalUnits < 16) return 'light';
  if (totalUnits < 20) return 'typical';
  return 'heavy';
}

/** Any course code is accepted; plans are not tied to the catalog. */
export async function addPlanEntry(ds: DataSource, input: PlanEntryInput): Promise<UserPlan> {
  const userId = parseUserId(input.userId);
  if (typeof input.quarter !== 'string' || typeof input.courseCode !== 'string') {
    throw new BadRequestError('Plan quarter and course code are required');
  }

  const repo = ds.getRepository(UserPlan);
  const entry = repo.create({ ...buildPlanFields(input), userId });
  return withDbErrors('Failed to add plan entry', () => repo.save(entry));
}

export async function listPlan(ds: DataSource, userId: string, term?: TermFilter): Promise<UserPlan[]> {
  const entries = await ds.getRepository(UserPlan).find({ where: planWhere(userId, term) });
  return entries.sort((a, b) => compareTerms(a, b) || a.id - b.id);
}

export async function listPlanWithCatalog(
  ds: DataSource,
  userId: string,
  term?: TermFilter,
): Promise<PlanEntryWithCatalog[]> {
  const entries = await listPlan(ds, userId, term);
  const codes = [...new Set(entries.map((e) => e.courseCode))];
  const courses = codes.length
    ? await ds.getRepository(Course).find({ where: { courseCode: In(codes) }, order: { major: 'ASC' } })
    : [];

  return entries.map((entry) => ({
    entry,
    courses: courses.filter((c) => c.courseCode === entry.courseCode),
  }));
}

export async function updatePlanEntry(
  ds: DataSource,
  userId: string,
  id: number,
  changes: PlanEntryChanges,
): Promise<UserPlan> {
  const entry = await findOwnedEntry(ds, userId, id);
  Object.assign(entry, buildPlanFields(changes));
  return withDbErrors('Failed to update plan entry', () => ds.getRepository(UserPlan).save(entry));
}

export async function removePlanEntry(ds: DataSource, userId: string, id: number): Promise<void> {
  const entry = await findOwnedEntry(ds, userId, id);
  await ds.getRepository(UserPlan).remove(entry);
}

/** Removes the user's entries for one term and returns how many were removed. */
export async function clearTerm(ds: DataSource, userId: string, term: PlanTerm): Promise<number> {
  const repo = ds.getRepository(UserPlan);
  const entries = await repo.find({ where: planWhere(userId, exactTerm(term)) });
  if (entries.length) await repo.remove(entries);
  return entries.length;
}

export async function summarizeTerm(ds: DataSource, userId: string, term: PlanTerm): Promise<TermSummary> {
  const entries = await listPlan(ds, userId, exactTerm(term));
  const totalUnits = entries.reduce((sum, e) => sum + (e.units ?? 0), 0);
  const load = classifyLoad(totalUnits);

  return {
    userId: parseUserId(userId),
    quarter: parseQuarter(term.quarter),
    year: parseYear(term.year ?? null),
    entries: entries.length,
    totalUnits,
    load,
    requiresApproval: load === 'heavy',
  };
}
