import { Body, Controller, Get, Param, Post, Query } from '@nestjs/common';

import { ActivitiesService } from '../activities/activities.service';
import { CourseInstancesService } from './course-instances.service';

@Controller('course-instances')
export class CourseInstancesController {
  constructor(
    private readonly svc: CourseInstancesService,
    private readonly activities: ActivitiesService,
  ) {}

  /**
   * GET /course-instances?year=2025
   */
  @Get()
  async list(@Query('year') year?: string) {
    return this.svc.list(year);
  }

  @Get(':id')
  async findOne(@Param('id') id: string) {
    return this.svc.findById(id);
  }

  /**
   * ✅ Enroll more students
   * POST /course-instances/:id/students
   * body: { count }
   */
  @Post(':id/students')
  async addStudents(@Param('id') id: string, @Body('count') count: unknown) {
    return this.svc.increaseStudentCount(id, count);
  }

  /**
   * ✅ Planned vs actual cost (KSEK)
   */
  @Get(':id/cost')
  async cost(@Param('id') id: string) {
    return this.svc.computeCost(id);
  }

  @Get(':id/activities')
  async plannedActivities(@Param('id') id: string) {
    return this.svc.plannedActivities(id);
  }

  /**
   * POST /course-instances/:id/activities
   * body: { activityId, plannedHours }
   */
  @Post(':id/activities')
  async associate(
    @Param('id') id: string,
    @Body('activityId') activityId: unknown,
    @Body('plannedHours') plannedHours: unknown,
  ) {
    return this.activities.associate(id, activityId, plannedHours);
  }

  @Get(':id/allocations')
  async allocations(@Param('id') id: string) {
    return this.svc.allocations(id);
  }
}
