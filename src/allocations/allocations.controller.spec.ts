import { Test, TestingModule } from '@nestjs/testing';

import { TransactionBoundary, TRANSACTION_UNIT_SOURCE } from '../database/transaction-boundary';
import { InMemoryTeachingDatabase } from '../testing/in-memory-teaching-database';
import { AllocationsController } from './allocations.controller';
import { AllocationsService } from './allocations.service';

describe('AllocationsController', () => {
  let controller: AllocationsController;
  let db: InMemoryTeachingDatabase;

  beforeEach(async () => {
    db = new InMemoryTeachingDatabase();
    db.addInstance({ instanceId: '2025-50001', courseCode: 'IV1351', studyYear: 2025, studyPeriod: 'P2' });
    db.addActivity('Lecture', '1.00');
    db.plan('2025-50001', 1, '40');
    db.addEmployee(6, 'Test', 'Teacher', '500.00');

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AllocationsController],
      providers: [
        AllocationsService,
        TransactionBoundary,
        { provide: TRANSACTION_UNIT_SOURCE, useValue: db },
      ],
    }).compile();

    controller = module.get<AllocationsController>(AllocationsController);
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  it('allocates and deallocates from request body fields', async () => {
    const created = await controller.allocate('6', '2025-50001', '1', '8');
    expect(created.outcome).toBe('created');

    const ended = await controller.deallocate(6, '2025-50001', 1);
    expect(ended.allocation.status).toBe('terminated');
  });

  it('reads and writes the allocation rule', async () => {
    await controller.setRule(2);
    await expect(controller.getRule()).resolves.toEqual({
      maxInstancesPerPeriod: 2,
      isDefault: false,
    });
  });
});
