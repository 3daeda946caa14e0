import { Entity, PrimaryGeneratedColumn, Column, Check } from 'typeorm';

import { FACTOR_COLUMN } from '../common/numeric-columns';

@Entity({ name: 'teaching_activity' })
@Check('CHK_teaching_activity_factor', '"factor" > 0')
export class TeachingActivityEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text', unique: true })
  activityName!: string;

  // NUMERIC comes back from pg as a string
  @Column({ type: 'numeric', ...FACTOR_COLUMN })
  factor!: string;

  /**
   * Derived activities (administration, examination) get their hours from a
   * formula over course size; they never take manually planned hours.
   */
  @Column({ type: 'boolean', default: false })
  isDerived!: boolean;
}
