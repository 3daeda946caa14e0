import { Entity, PrimaryGeneratedColumn, Column, Index, Unique, Check } from 'typeorm';

import { HOURS_COLUMN } from '../common/numeric-columns';

// append-only; the highest versionNo per employee is the current rate
@Entity({ name: 'employee_salary_history' })
@Unique('UQ_salary_version', ['employeeId', 'versionNo'])
@Check('CHK_salary_hour', '"salaryHour" > 0')
export class SalaryVersionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'int' })
  employeeId!: number;

  @Column({ type: 'int' })
  versionNo!: number;

  @Column({ type: 'numeric', ...HOURS_COLUMN })
  salaryHour!: string;
}
