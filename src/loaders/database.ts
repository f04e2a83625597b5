import 'reflect-metadata';
import { DataSource } from 'typeorm';
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
dotenv.config();

import { Course } from '../models/Course';
import { Offering } from '../models/Offering';
import { UserPlan } from '../models/UserPlan';
import { _0001Init1767225600000 } from '../migrations/0001Init';

export const ENTITIES = [Course, Offering, UserPlan];
export const MIGRATIONS = [_0001Init1767225600000];

export const DEFAULT_SQLITE_PATH = path.join('data', 'planner.sqlite');

export type DatabaseConfig =
  | { type: 'postgres'; url: string; synchronize: boolean; logging: boolean }
  | { type: 'sqlite'; database: string; synchronize: boolean; logging: boolean };

export interface DatabaseStatus {
  status: 'Connected' | 'Disconnected';
  engine: DatabaseConfig['type'] | null;
  timestamp: string;
  tables?: { courses: number; offerings: number; user_plans: number };
}

// PostgreSQL when DATABASE_URL is set, otherwise a local SQLite file
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const development = env.NODE_ENV === 'development';
  const logging = development || env.DB_LOGGING === 'true';
  const url = env.DATABASE_URL?.trim();

  if (url) {
    return { type: 'postgres', url, synchronize: development, logging };
  }
  return {
    type: 'sqlite',
    database: env.SQLITE_PATH?.trim() || DEFAULT_SQLITE_PATH,
    synchronize: development,
    logging,
  };
}

function ensureDataDir(database: string) {
  if (database === ':memory:') return database;
  const file = path.resolve(process.cwd(), database);
  const dir = path.dirname(file);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  return file;
}

export function createDataSource(config: DatabaseConfig): DataSource {
  const common = {
    entities: ENTITIES,
    migrations: MIGRATIONS,
    synchronize: config.synchronize,
    // the schema comes from either synchronize or the SQL migrations, never both
    migrationsRun: !config.synchronize,
    logging: config.logging,
  };

  if (config.type === 'postgres') {
    return new DataSource({ type: 'postgres', url: config.url, ...common });
  }
  return new DataSource({ type: 'sqlite', database: ensureDataDir(config.database), ...common });
}

let dataSource: DataSource | null = null;

export async function connectDatabase(config: DatabaseConfig = loadDatabaseConfig()): Promise<DataSource> {
  if (dataSource?.isInitialized) return dataSource;

  const ds = createDataSource(config);
  try {
    await ds.initialize();
  } catch (err) {
    console.error('❌ Failed to initialize database', err);
    throw err;
  }
  dataSource = ds;
  if (config.type === 'postgres') {
    console.log('✅ PostgreSQL database connected');
  } else {
    console.log(`✅ SQLite database connected (${config.database})`);
  }
  return ds;
}

export function getDataSource(): DataSource {
  if (!dataSource?.isInitialized) {
    throw new Error('Database is not connected; call connectDatabase() first');
  }
  return dataSource;
}

export async function disconnectDatabase(): Promise<void> {
  if (dataSource?.isInitialized) {
    await dataSource.destroy();
  }
  dataSource = null;
}

export async function databaseStatus(ds: DataSource | null = dataSource): Promise<DatabaseStatus> {
  const timestamp = new Date().toISOString();
  if (!ds?.isInitialized) {
    return { status: 'Disconnected', engine: null, timestamp };
  }

  const [courses, offerings, userPlans] = await Promise.all([
    ds.getRepository(Course).count(),
    ds.getRepository(Offering).count(),
    ds.getRepository(UserPlan).count(),
  ]);
  return {
    status: 'Connected',
    engine: ds.options.type === 'postgres' ? 'postgres' : 'sqlite',
    timestamp,
    tables: { courses, offerings, user_plans: userPlans },
  };
}
