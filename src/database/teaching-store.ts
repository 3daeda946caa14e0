import { Decimal } from '../common/decimal';
import { AllocationKey, TeachingAllocation } from '../allocations/allocation-state';

export type CourseInstanceRecord = {
  instanceId: string;
  courseCode: string;
  courseName: string;
  studyYear: number;
  studyPeriod: string;
  numStudents: number;
  layoutVersionNo: number;
};

export type TeachingActivityRecord = {
  id: number;
  name: string;
  factor: Decimal;
  isDerived: boolean;
};

export type PlannedActivityRecord = {
  instanceId: string;
  activityId: number;
  activityName: string;
  plannedHours: Decimal;
  factor: Decimal;
};

export type SalaryVersionRecord = {
  id: number;
  employeeId: number;
  versionNo: number;
  salaryHour: Decimal;
};

/** Active allocation joined with who, what, where and the pinned rate. */
export type AllocationView = {
  employeeId: number;
  teacherName: string;
  instanceId: string;
  courseCode: string;
  courseName: string;
  studyYear: number;
  studyPeriod: string;
  activityId: number;
  activityName: string;
  allocatedHours: Decimal;
  salaryVersionId: number;
  salaryHour: Decimal;
};

export interface CourseInstanceStore {
  findAll(): Promise<CourseInstanceRecord[]>;
  findByYear(year: number): Promise<CourseInstanceRecord[]>;
  /** `forUpdate` takes the row lock (FOR NO KEY UPDATE) until the unit ends. */
  findById(instanceId: string, forUpdate: boolean): Promise<CourseInstanceRecord | null>;
  updateStudentCount(instanceId: string, numStudents: number): Promise<void>;
  plannedActivities(instanceId: string): Promise<PlannedActivityRecord[]>;
  isPlanned(instanceId: string, activityId: number): Promise<boolean>;
  addPlannedActivity(instanceId: string, activityId: number, plannedHours: Decimal): Promise<void>;
}

export interface TeachingCatalog {
  listActivities(): Promise<TeachingActivityRecord[]>;
  findActivityById(activityId: number): Promise<TeachingActivityRecord | null>;
  findActivityByName(name: string): Promise<TeachingActivityRecord | null>;
  createActivity(name: string, factor: Decimal): Promise<TeachingActivityRecord>;
  currentSalaryVersion(employeeId: number): Promise<SalaryVersionRecord | null>;
}

export interface AllocationLedger {
  /** Locks the employee anchor row (FOR UPDATE); false when the employee is unknown. */
  lockEmployee(employeeId: number): Promise<boolean>;
  find(key: AllocationKey, forUpdate: boolean): Promise<TeachingAllocation | null>;
  /** Distinct course instances the employee actively teaches in one period. */
  activeInstanceIds(employeeId: number, studyPeriod: string, studyYear: number): Promise<string[]>;
  insert(allocation: TeachingAllocation): Promise<void>;
  /** Persists a state transition of an existing row. */
  save(allocation: TeachingAllocation): Promise<void>;
  activeByInstance(instanceId: string): Promise<AllocationView[]>;
  activeByEmployee(employeeId: number, studyPeriod: string, studyYear: number): Promise<AllocationView[]>;
  activeByActivityName(activityName: string): Promise<AllocationView[]>;
  readAllocationLimit(): Promise<number | null>;
  writeAllocationLimit(maxInstancesPerPeriod: number): Promise<void>;
}

/**
 * Handle over one open transaction. Built fresh for every unit and dropped
 * when the unit ends.
 */
export interface TeachingStore {
  readonly instances: CourseInstanceStore;
  readonly catalog: TeachingCatalog;
  readonly ledger: AllocationLedger;
}
