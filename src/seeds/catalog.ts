import fs from 'fs';
import { parse } from 'csv-parse';
import { DataSource } from 'typeorm';
import { upsertCourse } from '../services/coursesService';
import { buildOfferingFields, OfferingInput, upsertOffering } from '../services/offeringsService';
import { BadRequestError } from '../utils/errorHandler';
import { inferLevel } from '../utils/validation';

export interface SkippedRow {
  line: number;
  reason: string;
}

export interface CatalogImportResult {
  courses: number;
  offerings: number;
  skipped: SkippedRow[];
}

type CatalogRow = Record<string, string | undefined>;

const REQUIRED_COLUMNS = ['major', 'course_code', 'title'] as const;

// "Course Code" -> "course_code"
function normalizeHeader(header: string[]): string[] {
  return header.map((h) => h.trim().toLowerCase().replace(/\s+/g, '_'));
}

function optional(row: CatalogRow, column: string): string | undefined {
  const value = row[column]?.trim();
  return value ? value : undefined;
}

/**
 * Loads a catalog CSV: one course per row, plus an offering when the row names
 * a quarter. Re-importing the same file updates rows in place.
 */
export async function importCatalogCsv(ds: DataSource, filePath: string): Promise<CatalogImportResult> {
  const parser = fs
    .createReadStream(filePath)
    .pipe(parse({ columns: normalizeHeader, skip_empty_lines: true, trim: true, info: true }));

  const courseIds = new Set<number>();
  const skipped: SkippedRow[] = [];
  let offerings = 0;

  for await (const { record, info } of parser) {
    const row: CatalogRow = record;
    const line: number = info.lines;

    const missing = REQUIRED_COLUMNS.filter((c) => !optional(row, c));
    if (missing.length) {
      skipped.push({ line, reason: `missing ${missing.join(', ')}` });
      console.warn(`⚠️  Skipping line ${line}: missing ${missing.join(', ')}`);
      continue;
    }

    const courseCode = optional(row, 'course_code') ?? '';
    const quarter = optional(row, 'quarter');
    const offering: Omit<OfferingInput, 'courseId'> | null = quarter
      ? {
          quarter,
          year: optional(row, 'year'),
          status: optional(row, 'status'),
          notes: optional(row, 'notes'),
          instructorName: optional(row, 'instructor_name'),
          instructorEmail: optional(row, 'instructor_email'),
          meetingPattern: optional(row, 'meeting_pattern'),
        }
      : null;

    try {
      // a row with a bad offering is skipped whole, so check it before the course is written
      if (offering) buildOfferingFields(offering);

      const course = await upsertCourse(ds, {
        major: optional(row, 'major') ?? '',
        courseCode,
        title: optional(row, 'title') ?? '',
        units: optional(row, 'units'),
        level: optional(row, 'level') ?? inferLevel(courseCode) ?? undefined,
        description: optional(row, 'description'),
        prerequisites: optional(row, 'prerequisites'),
        additionalInfo: optional(row, 'additional_info'),
        catalogUrl: optional(row, 'catalog_url'),
      });
      courseIds.add(course.id);

      if (offering) {
        await upsertOffering(ds, { ...offering, courseId: course.id });
        offerings++;
      }
    } catch (err) {
      if (!(err instanceof BadRequestError)) throw err;
      skipped.push({ line, reason: err.message });
      console.warn(`⚠️  Skipping line ${line}: ${err.message}`);
    }
  }

  return { courses: courseIds.size, offerings, skipped };
}
