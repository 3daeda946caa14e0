import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';

import { TransactionUnit, TransactionUnitSource } from './transaction-boundary';
import { createTypeOrmTeachingStore } from './typeorm-teaching-store';

/**
 * Every unit gets its own pooled connection (QueryRunner) and its own store
 * over that runner's manager; nothing is shared between transactions.
 */
@Injectable()
export class TypeOrmTransactionUnitSource implements TransactionUnitSource {
  constructor(private readonly dataSource: DataSource) {}

  async open(): Promise<TransactionUnit> {
    const runner = this.dataSource.createQueryRunner();
    try {
      await runner.connect();
      await runner.startTransaction('READ COMMITTED');
    } catch (err) {
      await runner.release();
      throw err;
    }

    return {
      store: createTypeOrmTeachingStore(runner.manager),
      commit: () => runner.commitTransaction(),
      rollback: () => runner.rollbackTransaction(),
      release: () => runner.release(),
    };
  }
}
