import type { StateRecord } from './state-record.interface';

/**
 * Persisted run state. Read at the start of a run; written only by the run controller
 * after the run reaches its terminal action.
 */
export interface StateStore {
  /** Resolves to null when no usable record exists for the hostname. */
  read(hostname: string): Promise<StateRecord | null>;
  /** Replaces the hostname's record atomically. Rejects with StatePersistenceError. */
  write(record: StateRecord): Promise<void>;
}
