import { OperationInProgressError } from './errors.js';
import { Logger } from './logger.js';

/**
 * Single-holder lock for radio operations. Scan and connect share one
 * adapter, so at most one of them runs at a time; a second caller is
 * refused rather than queued.
 */
export class OperationLock {
  private activeOperation: string | null = null;
  private claimTime: number | null = null;
  private logger: Logger;

  constructor(private readonly maxClaimDurationMs = 120000) {
    this.logger = new Logger('OperationLock');
  }

  tryClaim(operation: string): boolean {
    // Auto-release stale claims to prevent permanent lockup
    if (this.activeOperation !== null && this.claimTime !== null) {
      const claimDuration = Date.now() - this.claimTime;
      if (claimDuration > this.maxClaimDurationMs) {
        this.logger.error(`Auto-releasing stale claim after ${claimDuration}ms: ${this.activeOperation}`);
        this.activeOperation = null;
        this.claimTime = null;
      }
    }

    if (this.activeOperation !== null) {
      this.logger.debug(`Claim for '${operation}' denied; '${this.activeOperation}' holds the lock`);
      return false;
    }

    this.activeOperation = operation;
    this.claimTime = Date.now();
    this.logger.debug(`Claimed by ${operation}`);
    return true;
  }

  release(operation: string): boolean {
    if (this.activeOperation !== operation) {
      this.logger.warn(`Cannot release '${operation}'; held by '${this.activeOperation}'`);
      return false;
    }

    this.activeOperation = null;
    this.claimTime = null;
    this.logger.debug(`Released by ${operation}`);
    return true;
  }

  /** Run `task` while holding the lock, or reject with OperationInProgressError. */
  async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    if (!this.tryClaim(operation)) {
      throw new OperationInProgressError(this.activeOperation ?? 'unknown');
    }
    try {
      return await task();
    } finally {
      this.release(operation);
    }
  }

  getActiveOperation(): string | null {
    return this.activeOperation;
  }

  isFree(): boolean {
    return this.activeOperation === null;
  }
}
