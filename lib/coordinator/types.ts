import type { Snapshot } from "@/lib/types/snapshot";

export type CoordinatorState = "idle" | "polling" | "degraded";

export interface FailedDevice {
  serial: string;
  error: string;
}

export interface PollCycleResult {
  /** Published snapshot after the cycle (the previous one when the cycle failed) */
  snapshot?: Snapshot;
  success: boolean;
  /** Some, but not all, devices failed */
  degraded: boolean;
  failedDevices: FailedDevice[];
  needsReauthentication: boolean;
  startedAt: Date;
  durationMs: number;
  error?: string;
}

export interface PollingStatusRecorder {
  recordPoll(entryId: string, result: PollCycleResult): Promise<void>;
}

export interface SnapshotView {
  snapshot?: Snapshot;
  /** The last cycle failed and the snapshot is from an earlier one */
  stale: boolean;
}
