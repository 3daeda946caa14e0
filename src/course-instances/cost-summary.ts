import { Decimal } from '../common/decimal';
import {
  AllocationView,
  CourseInstanceRecord,
  PlannedActivityRecord,
} from '../database/teaching-store';

export const PLANNED_HOURLY_RATE = Symbol('PLANNED_HOURLY_RATE');
export const DEFAULT_PLANNED_HOURLY_RATE = '600.00';

// SEK -> KSEK
const REPORTING_DIVISOR = Decimal.parse(1000);
const REPORTING_SCALE = 2;

export type CostSummary = {
  courseCode: string;
  instanceId: string;
  studyPeriod: string;
  studyYear: number;
  plannedHours: string;
  allocatedHours: string;
  plannedCost: string;
  actualCost: string;
};

/**
 * Average hourly rate used to price planned hours. Falls back to the default
 * when PLANNED_HOURLY_RATE is unset; a set but malformed value stops the boot.
 */
export function readPlannedHourlyRate(raw: string | undefined): Decimal {
  const value = (raw ?? '').trim();
  if (!value) return Decimal.parse(DEFAULT_PLANNED_HOURLY_RATE);

  const rate = Decimal.tryParse(value);
  if (!rate || !rate.isPositive()) {
    throw new Error(`PLANNED_HOURLY_RATE must be a positive decimal (got "${value}").`);
  }
  return rate;
}

export function toReportingUnit(sek: Decimal) {
  return sek.dividedBy(REPORTING_DIVISOR, REPORTING_SCALE);
}

/** planned hours x activity factor */
export function effectiveHours(activity: PlannedActivityRecord) {
  return activity.plannedHours.times(activity.factor);
}

export function computeCostSummary(
  instance: CourseInstanceRecord,
  planned: PlannedActivityRecord[],
  allocations: AllocationView[],
  plannedHourlyRate: Decimal,
): CostSummary {
  const plannedHours = Decimal.sum(planned.map(effectiveHours));
  const allocatedHours = Decimal.sum(allocations.map((a) => a.allocatedHours));
  const actualSek = Decimal.sum(allocations.map((a) => a.allocatedHours.times(a.salaryHour)));

  return {
    courseCode: instance.courseCode,
    instanceId: instance.instanceId,
    studyPeriod: instance.studyPeriod,
    studyYear: instance.studyYear,
    plannedHours: plannedHours.toFixed(2),
    allocatedHours: allocatedHours.toFixed(2),
    plannedCost: toReportingUnit(plannedHours.times(plannedHourlyRate)).toString(),
    actualCost: toReportingUnit(actualSek).toString(),
  };
}
