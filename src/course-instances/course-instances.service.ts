import { Inject, Injectable, Logger } from '@nestjs/common';

import { Decimal } from '../common/decimal';
import { normText, requireCount, requireId, requireText } from '../common/normalize';
import { INT4_MAX } from '../common/numeric-columns';
import {
  InvalidTeachingInputException,
  TeachingNotFoundException,
} from '../common/teaching.exceptions';
import { TransactionBoundary } from '../database/transaction-boundary';
import { TeachingStore } from '../database/teaching-store';
import { presentAllocationView } from '../allocations/allocation.presenter';
import { PLANNED_HOURLY_RATE, computeCostSummary, effectiveHours } from './cost-summary';

@Injectable()
export class CourseInstancesService {
  private readonly logger = new Logger(CourseInstancesService.name);

  constructor(
    private readonly tx: TransactionBoundary,

    @Inject(PLANNED_HOURLY_RATE)
    private readonly plannedHourlyRate: Decimal,
  ) {}

  private async ensureInstance(store: TeachingStore, instanceId: string, forUpdate = false) {
    const instance = await store.instances.findById(instanceId, forUpdate);
    if (!instance) throw new TeachingNotFoundException(`Course instance ${instanceId} not found.`);
    return instance;
  }

  /** All instances, or only those of one study year when `year` is given. */
  async list(year?: unknown) {
    if (!normText(year)) {
      return this.tx.run('list course instances', (store) => store.instances.findAll());
    }
    const y = requireId(year, 'year');
    return this.tx.run('list course instances', (store) => store.instances.findByYear(y));
  }

  async findById(instanceId: unknown) {
    const id = requireText(instanceId, 'instanceId');
    return this.tx.run('read course instance', (store) => this.ensureInstance(store, id));
  }

  /**
   * ✅ Adds `count` students.
   * The row is locked before it is read so two concurrent increases cannot
   * overwrite each other.
   */
  async increaseStudentCount(instanceId: unknown, count: unknown) {
    const id = requireText(instanceId, 'instanceId');
    const n = requireCount(count, 'count');

    const updated = await this.tx.run('increase student count', async (store) => {
      const instance = await this.ensureInstance(store, id, true);
      const numStudents = instance.numStudents + n;
      if (numStudents > INT4_MAX) {
        throw new InvalidTeachingInputException(
          `count would take instance ${id} past ${INT4_MAX} students (now ${instance.numStudents}).`,
        );
      }
      await store.instances.updateStudentCount(id, numStudents);
      return { ...instance, numStudents };
    });

    this.logger.log(`Course instance ${id}: +${n} students (now ${updated.numStudents})`);
    return { ok: true, instance: updated };
  }

  /**
   * Planned vs actual teaching cost in KSEK. Read-only; nothing is locked.
   */
  async computeCost(instanceId: unknown) {
    const id = requireText(instanceId, 'instanceId');

    return this.tx.run('compute teaching cost', async (store) => {
      const instance = await this.ensureInstance(store, id);
      const planned = await store.instances.plannedActivities(id);
      const allocations = await store.ledger.activeByInstance(id);
      return computeCostSummary(instance, planned, allocations, this.plannedHourlyRate);
    });
  }

  async plannedActivities(instanceId: unknown) {
    const id = requireText(instanceId, 'instanceId');

    const planned = await this.tx.run('list planned activities', async (store) => {
      await this.ensureInstance(store, id);
      return store.instances.plannedActivities(id);
    });

    return planned.map((p) => ({
      activityId: p.activityId,
      activityName: p.activityName,
      plannedHours: p.plannedHours.toFixed(2),
      factor: p.factor.toFixed(2),
      effectiveHours: effectiveHours(p).toFixed(2),
    }));
  }

  async allocations(instanceId: unknown) {
    const id = requireText(instanceId, 'instanceId');

    const rows = await this.tx.run('list instance allocations', async (store) => {
      await this.ensureInstance(store, id);
      return store.ledger.activeByInstance(id);
    });
    return rows.map(presentAllocationView);
  }
}
