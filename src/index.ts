import 'reflect-metadata';

export { Course } from './models/Course';
export { Offering } from './models/Offering';
export { UserPlan } from './models/UserPlan';

export {
  connectDatabase,
  createDataSource,
  databaseStatus,
  disconnectDatabase,
  getDataSource,
  loadDatabaseConfig,
} from './loaders/database';
export type { DatabaseConfig, DatabaseStatus } from './loaders/database';

export * from './services/coursesService';
export * from './services/offeringsService';
export * from './services/userPlansService';
export { importCatalogCsv } from './seeds/catalog';
export type { CatalogImportResult, SkippedRow } from './seeds/catalog';

export * from './utils/errorHandler';
export * from './utils/validation';
