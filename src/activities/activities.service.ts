import { Injectable, Logger } from '@nestjs/common';

import { requireDecimal, requireId, requireText } from '../common/normalize';
import { FACTOR_COLUMN, HOURS_COLUMN } from '../common/numeric-columns';
import {
  AllocationRejectedException,
  TeachingNotFoundException,
} from '../common/teaching.exceptions';
import { TransactionBoundary } from '../database/transaction-boundary';
import { TeachingActivityRecord } from '../database/teaching-store';
import { presentAllocationView } from '../allocations/allocation.presenter';

function presentActivity(a: TeachingActivityRecord) {
  return { id: a.id, name: a.name, factor: a.factor.toFixed(2), isDerived: a.isDerived };
}

@Injectable()
export class ActivitiesService {
  private readonly logger = new Logger(ActivitiesService.name);

  constructor(private readonly tx: TransactionBoundary) {}

  async list() {
    const rows = await this.tx.run('list teaching activities', (store) =>
      store.catalog.listActivities(),
    );
    return rows.map(presentActivity);
  }

  /**
   * ✅ New activities are always planned (never derived).
   * Names are unique regardless of case.
   */
  async create(name: unknown, factor: unknown) {
    const n = requireText(name, 'name');
    const f = requireDecimal(factor, 'factor', 'positive', FACTOR_COLUMN);

    const created = await this.tx.run('create teaching activity', async (store) => {
      const clash = await store.catalog.findActivityByName(n);
      if (clash) {
        this.logger.warn(`DUPLICATE_ACTIVITY_NAME: "${n}" clashes with activity ${clash.id}`);
        throw new AllocationRejectedException(
          'DUPLICATE_ACTIVITY_NAME',
          `Teaching activity "${clash.name}" already exists.`,
          { activityId: clash.id },
        );
      }
      return store.catalog.createActivity(n, f);
    });

    this.logger.log(`Teaching activity ${created.id} "${created.name}" created (factor ${f.toString()})`);
    return { ok: true, activity: presentActivity(created) };
  }

  /**
   * ✅ Plans hours for an activity on a course instance.
   * Derived activities have computed hours and are refused here.
   * A second association for the same pair is stopped by the table's key.
   */
  async associate(instanceId: unknown, activityId: unknown, plannedHours: unknown) {
    const iid = requireText(instanceId, 'instanceId');
    const aid = requireId(activityId, 'activityId');
    const hours = requireDecimal(plannedHours, 'plannedHours', 'non-negative', HOURS_COLUMN);

    const activity = await this.tx.run('associate activity', async (store) => {
      const instance = await store.instances.findById(iid, false);
      if (!instance) throw new TeachingNotFoundException(`Course instance ${iid} not found.`);

      const found = await store.catalog.findActivityById(aid);
      if (!found) throw new TeachingNotFoundException(`Teaching activity ${aid} not found.`);

      if (found.isDerived) {
        this.logger.warn(`DERIVED_ACTIVITY: refused planned hours for "${found.name}" on ${iid}`);
        throw new AllocationRejectedException(
          'DERIVED_ACTIVITY',
          `Cannot plan hours for derived activity "${found.name}"; its hours are computed.`,
          { activityId: aid },
        );
      }

      await store.instances.addPlannedActivity(iid, aid, hours);
      return found;
    });

    this.logger.log(`Activity "${activity.name}" planned on ${iid}: ${hours.toFixed(2)} h`);
    return {
      ok: true,
      instanceId: iid,
      activityId: aid,
      plannedHours: hours.toFixed(2),
    };
  }

  /** Active allocations of every activity with this name, any case. */
  async allocationsByName(activityName: unknown) {
    const name = requireText(activityName, 'name');
    const rows = await this.tx.run('list allocations by activity', (store) =>
      store.ledger.activeByActivityName(name),
    );
    return rows.map(presentAllocationView);
  }
}
