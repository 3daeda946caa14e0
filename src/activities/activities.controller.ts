import { Body, Controller, Get, Post, Query } from '@nestjs/common';

import { ActivitiesService } from './activities.service';

@Controller('activities')
export class ActivitiesController {
  constructor(private readonly svc: ActivitiesService) {}

  @Get()
  async list() {
    return this.svc.list();
  }

  /**
   * ✅ New planned activity
   * POST /activities
   * body: { name, factor }
   */
  @Post()
  async create(@Body('name') name: unknown, @Body('factor') factor: unknown) {
    return this.svc.create(name, factor);
  }

  /**
   * GET /activities/allocations?name=Lecture
   */
  @Get('allocations')
  async allocations(@Query('name') name: string) {
    return this.svc.allocationsByName(name);
  }
}
