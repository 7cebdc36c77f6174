/**
 * Scheduled message types and the facade contract. Persistence is in
 * data/message-store; the timers live in scheduling/timer-registry.
 */

export interface ScheduledMessage {
  id: string;
  scheduleTo: string; // ISO, UTC
  payload: Record<string, unknown>;
  webhookUrl: string;
}

/** Id filter for search and bulk delete. At least one field must be non-empty. */
export interface IdFilter {
  prefix?: string;
  contains?: string;
}

export interface SearchResult extends ScheduledMessage {
  /** Fire time of the in-memory timer, or null when the item is persisted but not armed. */
  nextRun: string | null;
}

export interface FailedId {
  id: string;
  error: string;
}

export interface BulkDeleteResult {
  deleted: number;
  messageIds: string[];
  failed: FailedId[];
}

export interface RestoreReport {
  restored: number;
  failed: FailedId[];
}

export interface TimerSnapshotEntry {
  id: string;
  fireAt: Date;
}

export interface HealthStatus {
  storeReachable: boolean;
  error?: string;
}

/** Transport-facing operations. Implemented by createScheduleService. */
export interface ScheduleService {
  schedule(
    input: unknown,
  ): Promise<{ status: "scheduled"; messageId: string; created: boolean }>;
  get(id: string): Promise<ScheduledMessage>;
  search(
    filter: IdFilter,
  ): Promise<{ count: number; messages: SearchResult[] }>;
  delete(id: string): Promise<{ status: "deleted"; messageId: string }>;
  bulkDelete(filter: IdFilter): Promise<BulkDeleteResult>;
  listInMemory(): {
    scheduledJobs: Array<{ messageId: string; nextRun: string }>;
    count: number;
  };
  healthCheck(): Promise<HealthStatus>;
  restore(): Promise<RestoreReport>;
  stop(): void;
}
