import { Entity, PrimaryColumn, Column, Check } from 'typeorm';

export const ALLOCATION_RULE_ID = 1;

@Entity({ name: 'allocation_rule' })
@Check('CHK_allocation_rule_single', '"id" = 1')
@Check('CHK_allocation_rule_max', '"maxInstancesPerPeriod" >= 1')
export class AllocationRuleEntity {
  @PrimaryColumn({ type: 'smallint' })
  id!: number;

  @Column({ type: 'int' })
  maxInstancesPerPeriod!: number;
}

// used when the allocation_rule row is missing
export const DEFAULT_ALLOCATION_LIMIT = 4;
