import { Decimal } from '../common/decimal';

export type AllocationKey = {
  employeeId: number;
  instanceId: string;
  activityId: number;
};

export type AllocationTerms = {
  salaryVersionId: number;
  hours: Decimal;
};

/**
 * `terminated` keeps the last terms so reports can still show what was
 * taught before the deallocation.
 */
export type AllocationState =
  | ({ status: 'active' } & AllocationTerms)
  | ({ status: 'terminated' } & AllocationTerms);

export type TeachingAllocation = {
  readonly key: AllocationKey;
  readonly state: AllocationState;
};

export class IllegalAllocationTransition extends Error {
  constructor(
    readonly key: AllocationKey,
    readonly from: AllocationState['status'] | 'absent',
    readonly to: AllocationState['status'],
  ) {
    super(
      `Allocation (employee ${key.employeeId}, instance ${key.instanceId}, activity ${key.activityId}) cannot go from ${from} to ${to}.`,
    );
    this.name = 'IllegalAllocationTransition';
  }
}

export function describeKey(key: AllocationKey) {
  return `employee ${key.employeeId} on instance ${key.instanceId} activity ${key.activityId}`;
}

export function isActive(a: TeachingAllocation) {
  return a.state.status === 'active';
}

// absent -> active
export function activate(key: AllocationKey, terms: AllocationTerms): TeachingAllocation {
  return { key, state: { status: 'active', ...terms } };
}

// terminated -> active; terms are replaced with the current ones
export function reactivate(
  allocation: TeachingAllocation,
  terms: AllocationTerms,
): TeachingAllocation {
  if (allocation.state.status !== 'terminated') {
    throw new IllegalAllocationTransition(allocation.key, allocation.state.status, 'active');
  }
  return { key: allocation.key, state: { status: 'active', ...terms } };
}

// active -> terminated
export function terminate(allocation: TeachingAllocation): TeachingAllocation {
  if (allocation.state.status !== 'active') {
    throw new IllegalAllocationTransition(allocation.key, allocation.state.status, 'terminated');
  }
  const { salaryVersionId, hours } = allocation.state;
  return { key: allocation.key, state: { status: 'terminated', salaryVersionId, hours } };
}
