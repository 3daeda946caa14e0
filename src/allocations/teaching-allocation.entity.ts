import { Entity, PrimaryGeneratedColumn, Column, Index, Unique, Check } from 'typeorm';

import { HOURS_COLUMN } from '../common/numeric-columns';

/**
 * One row per (employee, course instance, activity), ever. Deallocation sets
 * `isTerminated`; allocating the same triple again revives this row.
 */
@Entity({ name: 'teaching_allocation' })
@Unique('UQ_teaching_allocation_triple', ['employeeId', 'courseInstanceId', 'activityId'])
@Check('CHK_teaching_allocation_hours', '"allocatedHours" >= 0')
export class TeachingAllocationEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'int' })
  employeeId!: number;

  @Index()
  @Column({ type: 'varchar', length: 32 })
  courseInstanceId!: string;

  @Column({ type: 'int' })
  activityId!: number;

  // pinned version, not the live rate: keeps historical cost reproducible
  @Column({ type: 'int' })
  salaryVersionId!: number;

  @Column({ type: 'numeric', ...HOURS_COLUMN })
  allocatedHours!: string;

  @Column({ type: 'boolean', default: false })
  isTerminated!: boolean;
}
