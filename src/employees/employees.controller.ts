import { Controller, Get, Param, Query } from '@nestjs/common';

import { AllocationsService } from '../allocations/allocations.service';

@Controller('employees')
export class EmployeesController {
  constructor(private readonly svc: AllocationsService) {}

  /**
   * ✅ Active allocations of a teacher in one study period
   * GET /employees/:id/allocations?period=P1&year=2025
   */
  @Get(':id/allocations')
  async allocations(
    @Param('id') id: string,
    @Query('period') period: string,
    @Query('year') year: string,
  ) {
    return this.svc.forEmployee(id, period, year);
  }
}
