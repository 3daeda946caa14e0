import { Test, TestingModule } from '@nestjs/testing';

import { Decimal } from '../common/decimal';
import { InvalidTeachingInputException } from '../common/teaching.exceptions';
import { TransactionBoundary, TRANSACTION_UNIT_SOURCE } from '../database/transaction-boundary';
import { InMemoryTeachingDatabase } from '../testing/in-memory-teaching-database';
import { CourseInstancesService } from './course-instances.service';
import { PLANNED_HOURLY_RATE } from './cost-summary';

describe('CourseInstancesService', () => {
  let db: InMemoryTeachingDatabase;
  let service: CourseInstancesService;

  beforeEach(async () => {
    db = new InMemoryTeachingDatabase();
    db.addInstance({
      instanceId: '2025-50001',
      courseCode: 'IV1351',
      courseName: 'Data Storage Paradigms',
      studyYear: 2025,
      studyPeriod: 'P2',
      numStudents: 200,
    });
    db.addInstance({
      instanceId: '2024-40001',
      courseCode: 'IV1351',
      courseName: 'Data Storage Paradigms',
      studyYear: 2024,
      studyPeriod: 'P2',
      numStudents: 180,
    });
    db.addInstance({
      instanceId: '2025-50002',
      courseCode: 'IX1500',
      courseName: 'Discrete Mathematics',
      studyYear: 2025,
      studyPeriod: 'P1',
      numStudents: 150,
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CourseInstancesService,
        TransactionBoundary,
        { provide: TRANSACTION_UNIT_SOURCE, useValue: db },
        { provide: PLANNED_HOURLY_RATE, useValue: Decimal.parse('600.00') },
      ],
    }).compile();

    service = module.get<CourseInstancesService>(CourseInstancesService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('list', () => {
    it('orders by year (newest first), then period and course', async () => {
      const rows = await service.list();
      expect(rows.map((r) => r.instanceId)).toEqual(['2025-50002', '2025-50001', '2024-40001']);
    });

    it('filters on study year', async () => {
      const rows = await service.list('2025');
      expect(rows.map((r) => r.instanceId)).toEqual(['2025-50002', '2025-50001']);
      expect(rows[1]).toEqual({
        instanceId: '2025-50001',
        courseCode: 'IV1351',
        courseName: 'Data Storage Paradigms',
        layoutVersionNo: 1,
        studyYear: 2025,
        studyPeriod: 'P2',
        numStudents: 200,
      });
    });

    it('rejects a malformed year', async () => {
      await expect(service.list('twenty')).rejects.toThrow('year must be a positive integer.');
    });
  });

  it('reports an unknown instance', async () => {
    await expect(service.findById('2030-00001')).rejects.toThrow(
      'Course instance 2030-00001 not found.',
    );
  });

  describe('increaseStudentCount', () => {
    it('adds to the current count', async () => {
      const res = await service.increaseStudentCount('2025-50001', 25);

      expect(res.ok).toBe(true);
      expect(res.instance.numStudents).toBe(225);
      expect(db.instances.get('2025-50001')?.numStudents).toBe(225);
    });

    it('accepts zero', async () => {
      const res = await service.increaseStudentCount('2025-50001', '0');
      expect(res.instance.numStudents).toBe(200);
    });

    it('rejects a negative count and leaves the instance untouched', async () => {
      await expect(service.increaseStudentCount('2025-50001', -5)).rejects.toThrow(
        new InvalidTeachingInputException('count must not be negative (got -5).'),
      );
      expect(db.instances.get('2025-50001')?.numStudents).toBe(200);
      expect(db.commits + db.rollbacks).toBe(0);
    });

    it('refuses a total past the column range and keeps the count', async () => {
      await expect(service.increaseStudentCount('2025-50001', 2147483600)).rejects.toThrow(
        new InvalidTeachingInputException(
          'count would take instance 2025-50001 past 2147483647 students (now 200).',
        ),
      );
      expect(db.instances.get('2025-50001')?.numStudents).toBe(200);
      expect(db.rollbacks).toBe(1);
      expect(db.lockHeld('course_instance:2025-50001')).toBe(false);
    });

    it('loses no update under concurrent increases', async () => {
      await Promise.all(
        Array.from({ length: 10 }, () => service.increaseStudentCount('2025-50001', 1)),
      );
      expect(db.instances.get('2025-50001')?.numStudents).toBe(210);
    });

    it('rolls the count back when the write cannot commit', async () => {
      db.failOn('commit');
      await expect(service.increaseStudentCount('2025-50001', 10)).rejects.toThrow(
        'Teaching database failure during increase student count.',
      );
      expect(db.instances.get('2025-50001')?.numStudents).toBe(200);
    });
  });

  describe('computeCost', () => {
    beforeEach(() => {
      const lecture = db.addActivity('Lecture', '1.00');
      const lab = db.addActivity('Lab', '1.00');
      db.plan('2025-50001', lecture.id, '40.00');
      db.plan('2025-50001', lab.id, '30.00');

      db.addEmployee(6, 'Test', 'Teacher', '512.50');
      db.addEmployee(7, 'Former', 'Teacher', '800.00');
      db.addAllocation({ employeeId: 6, instanceId: '2025-50001', activityId: lecture.id }, '60');
      db.addAllocation(
        { employeeId: 7, instanceId: '2025-50001', activityId: lab.id },
        '20',
        'terminated',
      );
    });

    it('derives planned and actual cost in KSEK', async () => {
      await expect(service.computeCost('2025-50001')).resolves.toEqual({
        courseCode: 'IV1351',
        instanceId: '2025-50001',
        studyPeriod: 'P2',
        studyYear: 2025,
        plannedHours: '70.00',
        allocatedHours: '60.00',
        plannedCost: '42.00',
        actualCost: '30.75',
      });
    });

    it('keeps using the salary pinned at allocation time', async () => {
      db.addSalaryVersion(6, '900.00');
      const summary = await service.computeCost('2025-50001');
      expect(summary.actualCost).toBe('30.75');
    });

    it('changes nothing and gives the same answer twice', async () => {
      const first = await service.computeCost('2025-50001');
      const second = await service.computeCost('2025-50001');

      expect(second).toEqual(first);
      expect(db.instances.get('2025-50001')?.numStudents).toBe(200);
      expect(db.allocations.size).toBe(2);
    });

    it('is zero for an instance with nothing planned or allocated', async () => {
      const summary = await service.computeCost('2025-50002');
      expect(summary.plannedCost).toBe('0.00');
      expect(summary.actualCost).toBe('0.00');
    });

    it('lists planned activities with effective hours', async () => {
      await expect(service.plannedActivities('2025-50001')).resolves.toEqual([
        {
          activityId: 1,
          activityName: 'Lecture',
          plannedHours: '40.00',
          factor: '1.00',
          effectiveHours: '40.00',
        },
        {
          activityId: 2,
          activityName: 'Lab',
          plannedHours: '30.00',
          factor: '1.00',
          effectiveHours: '30.00',
        },
      ]);
    });

    it('lists only active allocations of the instance', async () => {
      const rows = await service.allocations('2025-50001');
      expect(rows.map((r) => [r.employeeId, r.activityName, r.allocatedHours])).toEqual([
        [6, 'Lecture', '60.00'],
      ]);
    });
  });
});
