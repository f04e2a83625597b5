import 'reflect-metadata';
import dotenv from 'dotenv';
dotenv.config();

import { createDataSource, loadDatabaseConfig } from './src/loaders/database';

const config = loadDatabaseConfig();
if (config.type === 'sqlite') {
  console.warn(`DATA SOURCE: DATABASE_URL not set; running migrations against SQLite at ${config.database}`);
}

// The typeorm CLI runs migrations explicitly, so schema sync stays off here
const dataSource = createDataSource({ ...config, synchronize: false });

export default dataSource;
