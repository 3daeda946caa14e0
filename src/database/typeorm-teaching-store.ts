import { EntityManager, SelectQueryBuilder } from 'typeorm';

import { Decimal } from '../common/decimal';
import { CourseInstanceEntity } from '../course-instances/course-instance.entity';
import { CourseLayoutEntity } from '../course-instances/course-layout.entity';
import { TeachingActivityEntity } from '../activities/teaching-activity.entity';
import { PlannedActivityEntity } from '../activities/planned-activity.entity';
import { EmployeeEntity } from '../employees/employee.entity';
import { SalaryVersionEntity } from '../employees/salary-version.entity';
import { TeachingAllocationEntity } from '../allocations/teaching-allocation.entity';
import { AllocationRuleEntity, ALLOCATION_RULE_ID } from '../allocations/allocation-rule.entity';
import { AllocationKey, TeachingAllocation } from '../allocations/allocation-state';
import {
  AllocationLedger,
  AllocationView,
  CourseInstanceRecord,
  CourseInstanceStore,
  PlannedActivityRecord,
  SalaryVersionRecord,
  TeachingActivityRecord,
  TeachingCatalog,
  TeachingStore,
} from './teaching-store';

// pg hands back int4 as number and NUMERIC as string; raw rows keep that shape
type CourseInstanceRow = {
  instanceId: string;
  courseCode: string;
  courseName: string;
  studyYear: number | string;
  studyPeriod: string;
  numStudents: number | string;
  layoutVersionNo: number | string;
};

type PlannedActivityRow = {
  instanceId: string;
  activityId: number | string;
  activityName: string;
  plannedHours: string;
  factor: string;
};

type AllocationViewRow = {
  employeeId: number | string;
  firstName: string;
  lastName: string;
  instanceId: string;
  courseCode: string;
  courseName: string;
  studyYear: number | string;
  studyPeriod: string;
  activityId: number | string;
  activityName: string;
  allocatedHours: string;
  salaryVersionId: number | string;
  salaryHour: string;
};

function toInstance(r: CourseInstanceRow): CourseInstanceRecord {
  return {
    instanceId: r.instanceId,
    courseCode: r.courseCode,
    courseName: r.courseName,
    studyYear: Number(r.studyYear),
    studyPeriod: r.studyPeriod,
    numStudents: Number(r.numStudents),
    layoutVersionNo: Number(r.layoutVersionNo),
  };
}

function toActivity(e: TeachingActivityEntity): TeachingActivityRecord {
  return {
    id: e.id,
    name: e.activityName,
    factor: Decimal.parse(e.factor),
    isDerived: e.isDerived,
  };
}

function toAllocation(e: TeachingAllocationEntity): TeachingAllocation {
  const terms = {
    salaryVersionId: e.salaryVersionId,
    hours: Decimal.parse(e.allocatedHours),
  };
  return {
    key: { employeeId: e.employeeId, instanceId: e.courseInstanceId, activityId: e.activityId },
    state: e.isTerminated ? { status: 'terminated', ...terms } : { status: 'active', ...terms },
  };
}

function toView(r: AllocationViewRow): AllocationView {
  return {
    employeeId: Number(r.employeeId),
    teacherName: `${r.firstName} ${r.lastName}`,
    instanceId: r.instanceId,
    courseCode: r.courseCode,
    courseName: r.courseName,
    studyYear: Number(r.studyYear),
    studyPeriod: r.studyPeriod,
    activityId: Number(r.activityId),
    activityName: r.activityName,
    allocatedHours: Decimal.parse(r.allocatedHours),
    salaryVersionId: Number(r.salaryVersionId),
    salaryHour: Decimal.parse(r.salaryHour),
  };
}

function whereKey(key: AllocationKey) {
  return {
    employeeId: key.employeeId,
    courseInstanceId: key.instanceId,
    activityId: key.activityId,
  };
}

export class TypeOrmCourseInstanceStore implements CourseInstanceStore {
  constructor(private readonly manager: EntityManager) {}

  private query(): SelectQueryBuilder<CourseInstanceEntity> {
    return this.manager
      .createQueryBuilder(CourseInstanceEntity, 'ci')
      .innerJoin(CourseLayoutEntity, 'cl', 'cl.courseCode = ci.courseCode')
      .select('ci.instanceId', 'instanceId')
      .addSelect('ci.courseCode', 'courseCode')
      .addSelect('cl.courseName', 'courseName')
      .addSelect('ci.studyYear', 'studyYear')
      .addSelect('ci.studyPeriod', 'studyPeriod')
      .addSelect('ci.numStudents', 'numStudents')
      .addSelect('ci.layoutVersionNo', 'layoutVersionNo');
  }

  async findAll() {
    const rows = await this.query()
      .orderBy('ci.studyYear', 'DESC')
      .addOrderBy('ci.studyPeriod', 'ASC')
      .addOrderBy('ci.courseCode', 'ASC')
      .getRawMany<CourseInstanceRow>();
    return rows.map(toInstance);
  }

  async findByYear(year: number) {
    const rows = await this.query()
      .where('ci.studyYear = :year', { year })
      .orderBy('ci.studyPeriod', 'ASC')
      .addOrderBy('ci.courseCode', 'ASC')
      .getRawMany<CourseInstanceRow>();
    return rows.map(toInstance);
  }

  async findById(instanceId: string, forUpdate: boolean) {
    const qb = this.query().where('ci.instanceId = :instanceId', { instanceId });
    // lock only the instance row, not the layout it joins
    if (forUpdate) qb.setLock('for_no_key_update', undefined, ['ci']);
    const row = await qb.getRawOne<CourseInstanceRow>();
    return row ? toInstance(row) : null;
  }

  async updateStudentCount(instanceId: string, numStudents: number) {
    await this.manager.update(CourseInstanceEntity, { instanceId }, { numStudents });
  }

  async plannedActivities(instanceId: string): Promise<PlannedActivityRecord[]> {
    const rows = await this.manager
      .createQueryBuilder(PlannedActivityEntity, 'pa')
      .innerJoin(TeachingActivityEntity, 'ta', 'ta.id = pa.activityId')
      .select('pa.courseInstanceId', 'instanceId')
      .addSelect('pa.activityId', 'activityId')
      .addSelect('ta.activityName', 'activityName')
      .addSelect('pa.plannedHours', 'plannedHours')
      .addSelect('ta.factor', 'factor')
      .where('pa.courseInstanceId = :instanceId', { instanceId })
      .orderBy('pa.activityId', 'ASC')
      .getRawMany<PlannedActivityRow>();

    return rows.map((r) => ({
      instanceId: r.instanceId,
      activityId: Number(r.activityId),
      activityName: r.activityName,
      plannedHours: Decimal.parse(r.plannedHours),
      factor: Decimal.parse(r.factor),
    }));
  }

  async isPlanned(instanceId: string, activityId: number) {
    return this.manager.exists(PlannedActivityEntity, {
      where: { courseInstanceId: instanceId, activityId },
    });
  }

  async addPlannedActivity(instanceId: string, activityId: number, plannedHours: Decimal) {
    await this.manager.insert(PlannedActivityEntity, {
      courseInstanceId: instanceId,
      activityId,
      plannedHours: plannedHours.toString(),
    });
  }
}

export class TypeOrmTeachingCatalog implements TeachingCatalog {
  constructor(private readonly manager: EntityManager) {}

  async listActivities() {
    const rows = await this.manager.find(TeachingActivityEntity, { order: { id: 'ASC' } });
    return rows.map(toActivity);
  }

  async findActivityById(activityId: number) {
    const row = await this.manager.findOne(TeachingActivityEntity, { where: { id: activityId } });
    return row ? toActivity(row) : null;
  }

  async findActivityByName(name: string) {
    const row = await this.manager
      .createQueryBuilder(TeachingActivityEntity, 'ta')
      .where('LOWER(ta.activityName) = LOWER(:name)', { name })
      .getOne();
    return row ? toActivity(row) : null;
  }

  async createActivity(name: string, factor: Decimal) {
    const created = this.manager.create(TeachingActivityEntity, {
      activityName: name,
      factor: factor.toString(),
      isDerived: false,
    });
    return toActivity(await this.manager.save(created));
  }

  async currentSalaryVersion(employeeId: number): Promise<SalaryVersionRecord | null> {
    const row = await this.manager.findOne(SalaryVersionEntity, {
      where: { employeeId },
      order: { versionNo: 'DESC' },
    });
    if (!row) return null;
    return {
      id: row.id,
      employeeId: row.employeeId,
      versionNo: row.versionNo,
      salaryHour: Decimal.parse(row.salaryHour),
    };
  }
}

export class TypeOrmAllocationLedger implements AllocationLedger {
  constructor(private readonly manager: EntityManager) {}

  async lockEmployee(employeeId: number) {
    const row = await this.manager
      .createQueryBuilder(EmployeeEntity, 'e')
      .select('e.id', 'id')
      .where('e.id = :employeeId', { employeeId })
      .setLock('pessimistic_write')
      .getRawOne<{ id: number }>();
    return row !== undefined;
  }

  async find(key: AllocationKey, forUpdate: boolean) {
    const row = await this.manager.findOne(TeachingAllocationEntity, {
      where: whereKey(key),
      ...(forUpdate ? { lock: { mode: 'pessimistic_write' as const } } : {}),
    });
    return row ? toAllocation(row) : null;
  }

  async activeInstanceIds(employeeId: number, studyPeriod: string, studyYear: number) {
    const rows = await this.manager
      .createQueryBuilder(TeachingAllocationEntity, 'a')
      .innerJoin(CourseInstanceEntity, 'ci', 'ci.instanceId = a.courseInstanceId')
      .select('DISTINCT a.courseInstanceId', 'instanceId')
      .where('a.employeeId = :employeeId', { employeeId })
      .andWhere('ci.studyPeriod = :studyPeriod', { studyPeriod })
      .andWhere('ci.studyYear = :studyYear', { studyYear })
      .andWhere('a.isTerminated = :terminated', { terminated: false })
      .getRawMany<{ instanceId: string }>();
    return rows.map((r) => r.instanceId).sort();
  }

  async insert(allocation: TeachingAllocation) {
    await this.manager.insert(TeachingAllocationEntity, {
      ...whereKey(allocation.key),
      salaryVersionId: allocation.state.salaryVersionId,
      allocatedHours: allocation.state.hours.toString(),
      isTerminated: allocation.state.status === 'terminated',
    });
  }

  async save(allocation: TeachingAllocation) {
    const result = await this.manager.update(TeachingAllocationEntity, whereKey(allocation.key), {
      salaryVersionId: allocation.state.salaryVersionId,
      allocatedHours: allocation.state.hours.toString(),
      isTerminated: allocation.state.status === 'terminated',
    });
    if (result.affected === 0) {
      throw new Error(
        `No allocation row for employee ${allocation.key.employeeId}, instance ${allocation.key.instanceId}, activity ${allocation.key.activityId}.`,
      );
    }
  }

  private views() {
    return this.manager
      .createQueryBuilder(TeachingAllocationEntity, 'a')
      .innerJoin(EmployeeEntity, 'e', 'e.id = a.employeeId')
      .innerJoin(CourseInstanceEntity, 'ci', 'ci.instanceId = a.courseInstanceId')
      .innerJoin(CourseLayoutEntity, 'cl', 'cl.courseCode = ci.courseCode')
      .innerJoin(TeachingActivityEntity, 'ta', 'ta.id = a.activityId')
      .innerJoin(SalaryVersionEntity, 's', 's.id = a.salaryVersionId')
      .select('a.employeeId', 'employeeId')
      .addSelect('e.firstName', 'firstName')
      .addSelect('e.lastName', 'lastName')
      .addSelect('a.courseInstanceId', 'instanceId')
      .addSelect('ci.courseCode', 'courseCode')
      .addSelect('cl.courseName', 'courseName')
      .addSelect('ci.studyYear', 'studyYear')
      .addSelect('ci.studyPeriod', 'studyPeriod')
      .addSelect('a.activityId', 'activityId')
      .addSelect('ta.activityName', 'activityName')
      .addSelect('a.allocatedHours', 'allocatedHours')
      .addSelect('a.salaryVersionId', 'salaryVersionId')
      .addSelect('s.salaryHour', 'salaryHour')
      .where('a.isTerminated = :terminated', { terminated: false });
  }

  async activeByInstance(instanceId: string) {
    const rows = await this.views()
      .andWhere('a.courseInstanceId = :instanceId', { instanceId })
      .orderBy('a.activityId', 'ASC')
      .addOrderBy('a.employeeId', 'ASC')
      .getRawMany<AllocationViewRow>();
    return rows.map(toView);
  }

  async activeByEmployee(employeeId: number, studyPeriod: string, studyYear: number) {
    const rows = await this.views()
      .andWhere('a.employeeId = :employeeId', { employeeId })
      .andWhere('ci.studyPeriod = :studyPeriod', { studyPeriod })
      .andWhere('ci.studyYear = :studyYear', { studyYear })
      .orderBy('a.courseInstanceId', 'ASC')
      .addOrderBy('a.activityId', 'ASC')
      .getRawMany<AllocationViewRow>();
    return rows.map(toView);
  }

  async activeByActivityName(activityName: string) {
    const rows = await this.views()
      .andWhere('LOWER(ta.activityName) = LOWER(:activityName)', { activityName })
      .orderBy('a.courseInstanceId', 'ASC')
      .addOrderBy('a.employeeId', 'ASC')
      .getRawMany<AllocationViewRow>();
    return rows.map(toView);
  }

  async readAllocationLimit() {
    const rule = await this.manager.findOne(AllocationRuleEntity, {
      where: { id: ALLOCATION_RULE_ID },
    });
    return rule ? rule.maxInstancesPerPeriod : null;
  }

  async writeAllocationLimit(maxInstancesPerPeriod: number) {
    await this.manager.upsert(
      AllocationRuleEntity,
      { id: ALLOCATION_RULE_ID, maxInstancesPerPeriod },
      ['id'],
    );
  }
}

export function createTypeOrmTeachingStore(manager: EntityManager): TeachingStore {
  return {
    instances: new TypeOrmCourseInstanceStore(manager),
    catalog: new TypeOrmTeachingCatalog(manager),
    ledger: new TypeOrmAllocationLedger(manager),
  };
}
