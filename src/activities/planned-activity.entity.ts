import { Entity, PrimaryColumn, Column, Check } from 'typeorm';

import { HOURS_COLUMN } from '../common/numeric-columns';

@Entity({ name: 'planned_activity' })
@Check('CHK_planned_activity_hours', '"plannedHours" >= 0')
export class PlannedActivityEntity {
  @PrimaryColumn({ type: 'varchar', length: 32 })
  courseInstanceId!: string;

  @PrimaryColumn({ type: 'int' })
  activityId!: number;

  @Column({ type: 'numeric', ...HOURS_COLUMN })
  plannedHours!: string;
}
