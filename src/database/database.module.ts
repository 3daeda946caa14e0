import { Module } from '@nestjs/common';

import { TransactionBoundary, TRANSACTION_UNIT_SOURCE } from './transaction-boundary';
import { TypeOrmTransactionUnitSource } from './typeorm-unit-source';

@Module({
  providers: [
    TypeOrmTransactionUnitSource,
    { provide: TRANSACTION_UNIT_SOURCE, useExisting: TypeOrmTransactionUnitSource },
    TransactionBoundary,
  ],
  exports: [TransactionBoundary],
})
export class DatabaseModule {}
