import { Module } from '@nestjs/common';

import { ActivitiesModule } from '../activities/activities.module';
import { DatabaseModule } from '../database/database.module';
import { CourseInstancesController } from './course-instances.controller';
import { CourseInstancesService } from './course-instances.service';
import { PLANNED_HOURLY_RATE, readPlannedHourlyRate } from './cost-summary';

@Module({
  imports: [DatabaseModule, ActivitiesModule],
  controllers: [CourseInstancesController],
  providers: [
    CourseInstancesService,
    {
      provide: PLANNED_HOURLY_RATE,
      useFactory: () => readPlannedHourlyRate(process.env.PLANNED_HOURLY_RATE),
    },
  ],
})
export class CourseInstancesModule {}
