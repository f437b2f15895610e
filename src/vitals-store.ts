import { Logger } from './logger.js';
import { VITAL_FIELDS, type VitalField, type VitalsSnapshot } from './types.js';

export type VitalsListener = (snapshot: Readonly<VitalsSnapshot>, timestamp: Date) => void;

/**
 * Authoritative snapshot of decoded vitals.
 *
 * Writes are copy-on-write: a new object replaces the old one in a single
 * assignment, so a reader holds either the previous or the next snapshot and
 * fields written together (systolic/diastolic) are never seen apart.
 */
export class VitalsStore {
  private snapshot: Readonly<VitalsSnapshot> = Object.freeze({});
  private updatedAt = new Map<VitalField, Date>();
  private subscribers: VitalsListener[] = [];
  private logger = new Logger('VitalsStore');

  update(field: VitalField, value: number, timestamp = new Date()): void {
    const patch: Partial<VitalsSnapshot> = {};
    patch[field] = value;
    this.updateMany(patch, timestamp);
  }

  updateMany(patch: Partial<VitalsSnapshot>, timestamp = new Date()): void {
    const fields = VITAL_FIELDS.filter(field => patch[field] !== undefined);
    if (fields.length === 0) {
      return;
    }

    const next: VitalsSnapshot = { ...this.snapshot };
    for (const field of fields) {
      next[field] = patch[field];
      this.updatedAt.set(field, timestamp);
    }
    this.snapshot = Object.freeze(next);

    this.notify(timestamp);
  }

  getSnapshot(): Readonly<VitalsSnapshot> {
    return Object.freeze({ ...this.snapshot });
  }

  getUpdatedAt(field: VitalField): Date | undefined {
    const at = this.updatedAt.get(field);
    return at ? new Date(at.getTime()) : undefined;
  }

  /** Forget every reading; subscribers are not told. */
  clear(): void {
    this.snapshot = Object.freeze({});
    this.updatedAt.clear();
  }

  subscribe(callback: VitalsListener): () => void {
    this.subscribers.push(callback);

    return () => {
      const index = this.subscribers.indexOf(callback);
      if (index > -1) {
        this.subscribers.splice(index, 1);
      }
    };
  }

  getSubscriberCount(): number {
    return this.subscribers.length;
  }

  private notify(timestamp: Date): void {
    // Iterate over a copy: a callback may unsubscribe itself
    for (const callback of [...this.subscribers]) {
      try {
        callback(Object.freeze({ ...this.snapshot }), new Date(timestamp.getTime()));
      } catch (error) {
        this.logger.error('Subscriber threw while handling a vitals update:', error);
      }
    }
  }
}
