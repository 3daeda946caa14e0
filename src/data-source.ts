import 'reflect-metadata';
import { DataSource } from 'typeorm';

import { TEACHING_ENTITIES } from './database/entities';

const dbSsl =
  (process.env.DB_SSL || '').toLowerCase() === 'true' ||
  (process.env.PGSSLMODE || '').toLowerCase() === 'require';

export const AppDataSource = new DataSource({
  type: 'postgres',
  url: process.env.DATABASE_URL,
  ssl: dbSsl ? { rejectUnauthorized: false } : undefined,
  extra: dbSsl ? { ssl: { rejectUnauthorized: false } } : undefined,

  entities: TEACHING_ENTITIES,

  // migrations no build
  migrations: ['dist/migrations/*.js'],

  synchronize: false,
  logging: false,
});
