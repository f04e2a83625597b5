import 'reflect-metadata';
import dotenv from 'dotenv';
dotenv.config();
import path from 'path';
import { connectDatabase, databaseStatus, disconnectDatabase } from '../loaders/database';
import { importCatalogCsv } from './catalog';

export const DEFAULT_CATALOG_CSV = path.join(process.cwd(), 'data', 'seed', 'catalog.csv');

export async function seed(csvArg?: string) {
  const csvPath = csvArg ? path.resolve(csvArg) : DEFAULT_CATALOG_CSV;
  const ds = await connectDatabase();

  console.log(`🌱 Importing catalog from ${csvPath}...`);
  const result = await importCatalogCsv(ds, csvPath);

  console.log('\n🎉 Seed completed successfully!');
  console.log(`📚 ${result.courses} courses upserted`);
  console.log(`🗓️  ${result.offerings} offerings upserted`);
  if (result.skipped.length) {
    console.log(`⚠️  ${result.skipped.length} rows skipped`);
  }

  const status = await databaseStatus(ds);
  console.log('\n📋 Database Summary:', status.tables);

  await disconnectDatabase();
}

/** Logs the failure, closes the connection if it can, and always exits with 1. */
export async function exitAfterFailure(
  error: unknown,
  exit: (code: number) => void = (code) => process.exit(code),
): Promise<void> {
  console.error('❌ Seed failed:', error);
  try {
    await disconnectDatabase();
  } catch (err) {
    console.error('❌ Failed to close database', err);
  } finally {
    exit(1);
  }
}

if (require.main === module) {
  seed(process.argv[2]).catch(exitAfterFailure);
}
