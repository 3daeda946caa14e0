import { Body, Controller, Delete, Get, Post, Put } from '@nestjs/common';

import { AllocationsService } from './allocations.service';

@Controller()
export class AllocationsController {
  constructor(private readonly svc: AllocationsService) {}

  /**
   * ✅ Allocate a teacher (or revive a terminated allocation)
   * POST /allocations
   * body: { employeeId, instanceId, activityId, hours }
   */
  @Post('allocations')
  async allocate(
    @Body('employeeId') employeeId: unknown,
    @Body('instanceId') instanceId: unknown,
    @Body('activityId') activityId: unknown,
    @Body('hours') hours: unknown,
  ) {
    return this.svc.allocate(employeeId, instanceId, activityId, hours);
  }

  /**
   * ✅ Terminate an allocation
   * DELETE /allocations
   * body: { employeeId, instanceId, activityId }
   */
  @Delete('allocations')
  async deallocate(
    @Body('employeeId') employeeId: unknown,
    @Body('instanceId') instanceId: unknown,
    @Body('activityId') activityId: unknown,
  ) {
    return this.svc.deallocate(employeeId, instanceId, activityId);
  }

  @Get('allocation-rule')
  async getRule() {
    return this.svc.getRule();
  }

  /**
   * PUT /allocation-rule
   * body: { maxInstancesPerPeriod }
   */
  @Put('allocation-rule')
  async setRule(@Body('maxInstancesPerPeriod') maxInstancesPerPeriod: unknown) {
    return this.svc.setRule(maxInstancesPerPeriod);
  }
}
