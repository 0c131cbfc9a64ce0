import type { MetricRecord } from '../mapping/record-mapper.js';

/** Destination for mapped records. Database administration happens before the first write. */
export interface RecordSink {
  ensureDatabases(names: string[]): Promise<void>;
  write(record: MetricRecord, database: string): Promise<void>;
  /** Releases connections; called once the last queued message is written. */
  close(): Promise<void>;
  describe(): string;
}
