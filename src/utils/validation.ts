import { BadRequestError } from './errorHandler';

// Chronological order inside an academic year
export const QUARTERS = ['Winter', 'Spring', 'Summer', 'Fall'] as const;
export type Quarter = (typeof QUARTERS)[number];

export const OFFERING_STATUSES = ['Open', 'Mixed', 'Full'] as const;
export const PLAN_TYPES = ['Major', 'GE', 'Elective', 'Minor'] as const;
export const COURSE_LEVELS = ['Lower', 'Upper', 'Grad'] as const;
export type CourseLevel = (typeof COURSE_LEVELS)[number];

export function validateEmail(email: string): boolean {
  const re = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
  return re.test(email);
}

export function validateId(id: unknown): id is number {
  return typeof id === 'number' && Number.isInteger(id) && id > 0;
}

export function validateUnits(units: unknown): units is number {
  return typeof units === 'number' && Number.isInteger(units) && units >= 0;
}

function collapseSpaces(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

/** "  pstat   120a " -> "PSTAT 120A" */
export function normalizeCourseCode(code: string): string {
  return collapseSpaces(code).toUpperCase();
}

export function normalizeMajor(major: string): string {
  return collapseSpaces(major);
}

export function normalizeQuarter(quarter: string): Quarter | null {
  const wanted = quarter.trim().toLowerCase();
  return QUARTERS.find((q) => q.toLowerCase() === wanted) ?? null;
}

export function normalizeYear(year: string | number): string | null {
  const value = String(year).trim();
  return /^\d{4}$/.test(value) ? value : null;
}

function canonical(value: string, known: readonly string[]): string {
  const trimmed = collapseSpaces(value);
  return known.find((k) => k.toLowerCase() === trimmed.toLowerCase()) ?? trimmed;
}

/** Known statuses get their canonical casing; anything else is kept as written. */
export function normalizeStatus(status: string): string {
  return canonical(status, OFFERING_STATUSES);
}

export function normalizePlanType(type: string): string {
  return canonical(type, PLAN_TYPES);
}

export function normalizeLevel(level: string): CourseLevel | null {
  const wanted = level.trim().toLowerCase();
  if (wanted.startsWith('lower')) return 'Lower';
  if (wanted.startsWith('upper')) return 'Upper';
  if (wanted.startsWith('grad')) return 'Grad';
  return null;
}

/**
 * Level from the course number: below 100 lower division, 100-199 upper
 * division, 200 and above graduate. Null when the code carries no number.
 */
export function inferLevel(courseCode: string): CourseLevel | null {
  const match = /(\d+)[A-Z]*$/i.exec(courseCode.trim());
  if (!match) return null;
  const num = parseInt(match[1], 10);
  if (num < 100) return 'Lower';
  if (num < 200) return 'Upper';
  return 'Grad';
}

export interface TermFilter {
  quarter?: string;
  year?: string | number | null;
}

/** Like normalizeQuarter, but an unknown quarter is a BadRequestError. */
export function parseQuarter(quarter: string): Quarter {
  const q = normalizeQuarter(quarter);
  if (!q) throw new BadRequestError(`Unknown quarter "${quarter}"`);
  return q;
}

/** Blank and null mean "no year"; anything else must be four digits. */
export function parseYear(year: string | number | null): string | null {
  if (year === null || String(year).trim() === '') return null;
  const y = normalizeYear(year);
  if (!y) throw new BadRequestError(`Invalid year "${year}"`);
  return y;
}

export function quarterRank(quarter: string): number {
  const q = normalizeQuarter(quarter);
  return q ? QUARTERS.indexOf(q) : QUARTERS.length;
}

/** Orders terms by year (year-less last), then by quarter within the year. */
export function compareTerms(
  a: { year?: string | null; quarter: string },
  b: { year?: string | null; quarter: string },
): number {
  const ay = a.year || null;
  const by = b.year || null;
  if (ay !== by) {
    if (!ay) return 1;
    if (!by) return -1;
    return ay < by ? -1 : 1;
  }
  return quarterRank(a.quarter) - quarterRank(b.quarter);
}
