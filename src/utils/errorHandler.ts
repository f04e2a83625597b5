import { QueryFailedError } from 'typeorm';

export class PlannerError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class BadRequestError extends PlannerError {
  constructor(message = 'Bad Request') {
    super(message, 400);
  }
}

export class NotFoundError extends PlannerError {
  constructor(message = 'Not Found') {
    super(message, 404);
  }
}

export class UniqueViolationError extends PlannerError {
  constructor(message = 'Conflict', cause?: unknown) {
    super(message, 409, { cause });
  }
}

export class ForeignKeyViolationError extends PlannerError {
  constructor(message = 'Referenced row does not exist', cause?: unknown) {
    super(message, 409, { cause });
  }
}

export class NotNullViolationError extends PlannerError {
  constructor(message = 'Required column is missing', cause?: unknown) {
    super(message, 400, { cause });
  }
}

// SQLSTATE class 23 codes used by PostgreSQL
const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';
const PG_NOT_NULL_VIOLATION = '23502';

function driverCode(err: Error): string | undefined {
  if ('code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

/**
 * Maps engine constraint failures onto PlannerError subclasses. Anything that
 * is not a recognised constraint failure comes back unchanged.
 */
export function translateDbError(error: unknown, context?: string): unknown {
  if (!(error instanceof QueryFailedError)) return error;

  const driverError: Error = error.driverError;
  const code = driverCode(driverError);
  const detail = driverError.message || error.message;
  const prefix = context ? `${context}: ` : '';

  if (code === PG_UNIQUE_VIOLATION || /UNIQUE constraint failed/i.test(detail)) {
    return new UniqueViolationError(`${prefix}${detail}`, error);
  }
  if (code === PG_FOREIGN_KEY_VIOLATION || /FOREIGN KEY constraint failed/i.test(detail)) {
    return new ForeignKeyViolationError(`${prefix}${detail}`, error);
  }
  if (code === PG_NOT_NULL_VIOLATION || /NOT NULL constraint failed/i.test(detail)) {
    return new NotNullViolationError(`${prefix}${detail}`, error);
  }
  return error;
}

/** Runs a database call, rethrowing constraint failures as PlannerErrors. */
export async function withDbErrors<T>(context: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    const translated = translateDbError(err, context);
    if (translated instanceof PlannerError) {
      console.error(`❌ ${translated.message}`);
    }
    throw translated;
  }
}

/**
 * Runs an insert-or-update once more when it lost a race to a concurrent
 * insert of the same unique key; the second run finds that row and updates it.
 */
export async function retryOnConflict<T>(run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (!(err instanceof UniqueViolationError)) throw err;
    return run();
  }
}
