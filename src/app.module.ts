import { Logger, Module } from '@nestjs/common';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';

import { TEACHING_ENTITIES } from './database/entities';
import { CourseInstancesModule } from './course-instances/course-instances.module';
import { ActivitiesModule } from './activities/activities.module';
import { AllocationsModule } from './allocations/allocations.module';
import { EmployeesModule } from './employees/employees.module';

const dbSsl =
  (process.env.DB_SSL || '').toLowerCase() === 'true' ||
  (process.env.PGSSLMODE || '').toLowerCase() === 'require';

// ✅ synchronize only outside production
const isProd = (process.env.NODE_ENV || '').toLowerCase() === 'production';
const syncRequested = (process.env.SYNC_DB || '').toLowerCase() === 'true';
const sync = !isProd && syncRequested;

const postgresConfig: TypeOrmModuleOptions = {
  type: 'postgres',
  url: process.env.DATABASE_URL,
  entities: TEACHING_ENTITIES,
  synchronize: sync,

  ssl: dbSsl ? { rejectUnauthorized: false } : undefined,
  extra: dbSsl ? { ssl: { rejectUnauthorized: false } } : undefined,
};

const logger = new Logger('Database');
logger.log(`NODE_ENV: ${process.env.NODE_ENV}`);
logger.log(`DATABASE_URL set: ${!!(process.env.DATABASE_URL || '').trim()}`);
logger.log(`synchronize (requested/effective): ${syncRequested}/${sync}`);
logger.log(`DB_SSL: ${process.env.DB_SSL} PGSSLMODE: ${process.env.PGSSLMODE}`);

@Module({
  imports: [
    TypeOrmModule.forRoot(postgresConfig),

    CourseInstancesModule,
    ActivitiesModule,
    AllocationsModule,
    EmployeesModule,
  ],
})
export class AppModule {}
