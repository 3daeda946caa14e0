import { Decimal } from '../common/decimal';
import {
  IllegalAllocationTransition,
  activate,
  describeKey,
  isActive,
  reactivate,
  terminate,
} from './allocation-state';

const key = { employeeId: 6, instanceId: '2025-50001', activityId: 1 };
const terms = { salaryVersionId: 1, hours: Decimal.parse('10.00') };

describe('allocation state', () => {
  it('activates a new allocation', () => {
    const a = activate(key, terms);
    expect(a.state.status).toBe('active');
    expect(a.state.salaryVersionId).toBe(1);
    expect(isActive(a)).toBe(true);
  });

  it('keeps the last terms when terminated', () => {
    const ended = terminate(activate(key, terms));
    expect(ended.state.status).toBe('terminated');
    expect(ended.state.hours.toString()).toBe('10.00');
    expect(isActive(ended)).toBe(false);
  });

  it('replaces the terms on reactivation', () => {
    const revived = reactivate(terminate(activate(key, terms)), {
      salaryVersionId: 3,
      hours: Decimal.parse('12.50'),
    });
    expect(revived.state).toEqual({
      status: 'active',
      salaryVersionId: 3,
      hours: Decimal.parse('12.50'),
    });
    expect(revived.key).toBe(key);
  });

  it('refuses transitions from the wrong state', () => {
    const active = activate(key, terms);
    expect(() => reactivate(active, terms)).toThrow(IllegalAllocationTransition);
    expect(() => terminate(terminate(active))).toThrow(
      'Allocation (employee 6, instance 2025-50001, activity 1) cannot go from terminated to terminated.',
    );
  });

  it('describes a key', () => {
    expect(describeKey(key)).toBe('employee 6 on instance 2025-50001 activity 1');
  });
});
