import type { OutputKey } from '@/types/grid';

/** Receives every derived value after each recalculation. */
export interface DisplaySink {
  update(key: OutputKey, value: number): void;
}
