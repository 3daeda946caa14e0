import { HttpException, Inject, Injectable, Logger } from '@nestjs/common';

import { TeachingStore } from './teaching-store';
import { TeachingStoreException } from '../common/teaching.exceptions';

/** One open database transaction and the store handle bound to it. */
export interface TransactionUnit {
  readonly store: TeachingStore;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  release(): Promise<void>;
}

export interface TransactionUnitSource {
  open(): Promise<TransactionUnit>;
}

export const TRANSACTION_UNIT_SOURCE = Symbol('TRANSACTION_UNIT_SOURCE');

function reason(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs one logical operation as one all-or-nothing unit of work: commit on
 * return, rollback on any throw, release always. Rule rejections (HTTP
 * exceptions) pass through untouched; everything else is reported as a
 * store failure and never retried here.
 */
@Injectable()
export class TransactionBoundary {
  private readonly logger = new Logger(TransactionBoundary.name);

  constructor(
    @Inject(TRANSACTION_UNIT_SOURCE)
    private readonly source: TransactionUnitSource,
  ) {}

  async run<T>(operation: string, work: (store: TeachingStore) => Promise<T>): Promise<T> {
    const unit = await this.open(operation);

    try {
      const result = await work(unit.store);
      await unit.commit();
      return result;
    } catch (err) {
      await this.rollbackQuietly(unit, operation);
      if (err instanceof HttpException) throw err;
      this.logger.error(`[${operation}] rolled back: ${reason(err)}`);
      throw new TeachingStoreException(operation, err);
    } finally {
      await this.releaseQuietly(unit, operation);
    }
  }

  private async open(operation: string) {
    try {
      return await this.source.open();
    } catch (err) {
      this.logger.error(`[${operation}] could not open transaction: ${reason(err)}`);
      throw new TeachingStoreException(operation, err);
    }
  }

  // a failed rollback is only logged; the error from the work is what gets rethrown
  private async rollbackQuietly(unit: TransactionUnit, operation: string) {
    try {
      await unit.rollback();
    } catch (err) {
      this.logger.error(`[${operation}] rollback failed: ${reason(err)}`);
    }
  }

  private async releaseQuietly(unit: TransactionUnit, operation: string) {
    try {
      await unit.release();
    } catch (err) {
      this.logger.error(`[${operation}] release failed: ${reason(err)}`);
    }
  }
}
