import { Module } from '@nestjs/common';

import { AllocationsModule } from '../allocations/allocations.module';
import { EmployeesController } from './employees.controller';

@Module({
  imports: [AllocationsModule],
  controllers: [EmployeesController],
})
export class EmployeesModule {}
