import { MigrationInterface, QueryRunner } from 'typeorm';
import fs from 'fs';
import path from 'path';
import { splitSqlStatements } from '../utils/dbHelpers';

export const MIGRATIONS_DIR = path.join(process.cwd(), 'migrations');

export class _0001Init1767225600000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    const engine = queryRunner.connection.options.type === 'postgres' ? 'postgres' : 'sqlite';
    const sqlPath = path.join(MIGRATIONS_DIR, engine, '0001_init.sql');
    const sql = fs.readFileSync(sqlPath, 'utf8');
    for (const stmt of splitSqlStatements(sql)) {
      await queryRunner.query(stmt);
    }
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // children before parents
    const drop = `
      DROP TABLE IF EXISTS user_plans;
      DROP TABLE IF EXISTS offerings;
      DROP TABLE IF EXISTS courses;
    `;
    for (const stmt of splitSqlStatements(drop)) {
      await queryRunner.query(stmt);
    }
  }
}
