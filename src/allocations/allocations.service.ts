import { Injectable, Logger } from '@nestjs/common';

import { TransactionBoundary } from '../database/transaction-boundary';
import { TeachingStore } from '../database/teaching-store';
import { normText, requireDecimal, requireId, requireText } from '../common/normalize';
import { HOURS_COLUMN } from '../common/numeric-columns';
import {
  AllocationRejectedException,
  AllocationRejectionDetails,
  AllocationRule,
  InvalidTeachingInputException,
  TeachingNotFoundException,
} from '../common/teaching.exceptions';
import { DEFAULT_ALLOCATION_LIMIT } from './allocation-rule.entity';
import {
  AllocationKey,
  AllocationTerms,
  TeachingAllocation,
  activate,
  describeKey,
  isActive,
  reactivate,
  terminate,
} from './allocation-state';
import { presentAllocation, presentAllocationView } from './allocation.presenter';

export type AllocationOutcome = 'created' | 'reactivated';

type AllocateResult = { outcome: AllocationOutcome; allocation: TeachingAllocation };

const STUDY_PERIOD = /^P[1-4]$/;

@Injectable()
export class AllocationsService {
  private readonly logger = new Logger(AllocationsService.name);

  constructor(private readonly tx: TransactionBoundary) {}

  private normKey(employeeId: unknown, instanceId: unknown, activityId: unknown): AllocationKey {
    return {
      employeeId: requireId(employeeId, 'employeeId'),
      instanceId: requireText(instanceId, 'instanceId'),
      activityId: requireId(activityId, 'activityId'),
    };
  }

  private normPeriod(period: unknown) {
    const p = normText(period).toUpperCase();
    if (!STUDY_PERIOD.test(p)) {
      throw new InvalidTeachingInputException('period must be one of P1, P2, P3, P4.');
    }
    return p;
  }

  private reject(rule: AllocationRule, message: string, details: AllocationRejectionDetails = {}) {
    this.logger.warn(`${rule}: ${message}`);
    return new AllocationRejectedException(rule, message, details);
  }

  /**
   * Lock order is fixed for every operation touching allocations: employee
   * anchor first, then anything else. Taking the anchor before the per-period
   * count is what keeps two concurrent requests for the same teacher from
   * both seeing room under the limit.
   */
  private async lockEmployee(store: TeachingStore, employeeId: number) {
    const exists = await store.ledger.lockEmployee(employeeId);
    if (!exists) throw new TeachingNotFoundException(`Employee ${employeeId} not found.`);
  }

  private async currentTerms(
    store: TeachingStore,
    employeeId: number,
    hours: AllocationTerms['hours'],
  ): Promise<AllocationTerms> {
    const salary = await store.catalog.currentSalaryVersion(employeeId);
    if (!salary) {
      throw new TeachingNotFoundException(`No salary version found for employee ${employeeId}.`);
    }
    return { salaryVersionId: salary.id, hours };
  }

  /**
   * ✅ Allocate a teacher to an activity on a course instance
   * - same triple terminated -> row revived with current salary version and hours
   * - same triple active     -> DUPLICATE_ALLOCATION
   * - new instance for the teacher in that period while at the limit -> ALLOCATION_LIMIT
   * - a further activity on an instance already taught takes no new slot
   */
  async allocate(employeeId: unknown, instanceId: unknown, activityId: unknown, hours: unknown) {
    const key = this.normKey(employeeId, instanceId, activityId);
    const h = requireDecimal(hours, 'hours', 'non-negative', HOURS_COLUMN);

    const { outcome, allocation } = await this.tx.run<AllocateResult>('allocate', async (store) => {
      await this.lockEmployee(store, key.employeeId);

      const instance = await store.instances.findById(key.instanceId, true);
      if (!instance) {
        throw new TeachingNotFoundException(`Course instance ${key.instanceId} not found.`);
      }

      const activity = await store.catalog.findActivityById(key.activityId);
      if (!activity) {
        throw new TeachingNotFoundException(`Teaching activity ${key.activityId} not found.`);
      }

      // hours can only be allocated against a planned association
      if (!(await store.instances.isPlanned(key.instanceId, key.activityId))) {
        throw new TeachingNotFoundException(
          `Activity ${key.activityId} is not planned on course instance ${key.instanceId}.`,
        );
      }

      const limit = (await store.ledger.readAllocationLimit()) ?? DEFAULT_ALLOCATION_LIMIT;
      const existing = await store.ledger.find(key, true);

      if (existing && isActive(existing)) {
        throw this.reject('DUPLICATE_ALLOCATION', `Allocation already exists for ${describeKey(key)}.`, {
          employeeId: key.employeeId,
          instanceId: key.instanceId,
          activityId: key.activityId,
        });
      }

      const { studyPeriod, studyYear } = instance;
      const active = await store.ledger.activeInstanceIds(key.employeeId, studyPeriod, studyYear);
      const takesNewSlot = !active.includes(key.instanceId);
      const atLimit = takesNewSlot && active.length >= limit;

      const terms = await this.currentTerms(store, key.employeeId, h);

      if (existing) {
        // revival never re-checks the limit
        if (atLimit) {
          this.logger.warn(
            `Reactivating ${describeKey(key)} puts employee ${key.employeeId} on ${active.length + 1} instances in ${studyPeriod} ${studyYear} (limit ${limit}).`,
          );
        }
        const revived = reactivate(existing, terms);
        await store.ledger.save(revived);
        return { outcome: 'reactivated', allocation: revived };
      }

      if (atLimit) {
        throw this.reject(
          'ALLOCATION_LIMIT',
          `Employee ${key.employeeId} would exceed ${limit} course instances in ${studyPeriod} ${studyYear}.`,
          {
            employeeId: key.employeeId,
            limit,
            activeInstances: active.length,
            period: studyPeriod,
            year: studyYear,
          },
        );
      }

      const created = activate(key, terms);
      await store.ledger.insert(created);
      return { outcome: 'created', allocation: created };
    });

    this.logger.log(`Allocation ${outcome}: ${describeKey(key)}, ${h.toFixed(2)} h`);
    return { ok: true, outcome, allocation: presentAllocation(allocation) };
  }

  /**
   * ✅ Soft delete: the row stays, flagged terminated.
   * Fails when there is no active allocation for the triple (absent or
   * already terminated).
   */
  async deallocate(employeeId: unknown, instanceId: unknown, activityId: unknown) {
    const key = this.normKey(employeeId, instanceId, activityId);

    const ended: TeachingAllocation = await this.tx.run('deallocate', async (store) => {
      await this.lockEmployee(store, key.employeeId);

      const existing = await store.ledger.find(key, true);
      if (!existing || !isActive(existing)) {
        throw new TeachingNotFoundException(`No active allocation for ${describeKey(key)}.`);
      }

      const next = terminate(existing);
      await store.ledger.save(next);
      return next;
    });

    this.logger.log(`Allocation terminated: ${describeKey(key)}`);
    return { ok: true, allocation: presentAllocation(ended) };
  }

  async forEmployee(employeeId: unknown, period: unknown, year: unknown) {
    const eid = requireId(employeeId, 'employeeId');
    const p = this.normPeriod(period);
    const y = requireId(year, 'year');

    const rows = await this.tx.run('list employee allocations', (store) =>
      store.ledger.activeByEmployee(eid, p, y),
    );
    return rows.map(presentAllocationView);
  }

  // ------------------------
  // Allocation rule
  // ------------------------
  async getRule() {
    const stored = await this.tx.run('read allocation rule', (store) =>
      store.ledger.readAllocationLimit(),
    );
    return {
      maxInstancesPerPeriod: stored ?? DEFAULT_ALLOCATION_LIMIT,
      isDefault: stored === null,
    };
  }

  async setRule(maxInstancesPerPeriod: unknown) {
    const max = requireId(maxInstancesPerPeriod, 'maxInstancesPerPeriod');

    await this.tx.run('write allocation rule', (store) => store.ledger.writeAllocationLimit(max));

    this.logger.log(`Allocation limit set to ${max} course instances per period`);
    return { ok: true, maxInstancesPerPeriod: max };
  }
}
