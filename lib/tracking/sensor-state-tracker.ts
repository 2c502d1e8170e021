import { classifyCounter } from "@/lib/mapping/field-tables";
import type { CounterClass } from "@/lib/mapping/field-tables";
import { toNumber } from "@/lib/mapping/field-mapper";
import { getLocalDateString } from "@/lib/date-utils";
import type { SensorValue } from "@/lib/types/snapshot";

export interface SensorTrackingState {
  lastValidValue: number;
  lastUpdateDate: string;
  /** Set on rollover: the next read of the new day is taken as-is */
  acceptNext: boolean;
}

export interface SensorStateTrackerOptions {
  /** Station zone, resolved at read time ("GMT -8" or IANA) */
  timezone?: () => string | undefined;
  clock?: () => Date;
  classify?: (sensorKey: string) => CounterClass | null;
  /** Prefix for log lines */
  label?: string;
}

/**
 * Guards cumulative counters against transport glitches.
 *
 * Lifetime counters never go down. Daily counters are forced to 0 on the
 * first read of a new local day, then accumulate from transport values.
 * One tracker belongs to one fleet entry; state is in memory only.
 */
export class SensorStateTracker {
  private states = new Map<string, SensorTrackingState>();
  private timezone: () => string | undefined;
  private clock: () => Date;
  private classify: (sensorKey: string) => CounterClass | null;
  private label: string;

  constructor(options: SensorStateTrackerOptions = {}) {
    this.timezone = options.timezone ?? (() => undefined);
    this.clock = options.clock ?? (() => new Date());
    this.classify = options.classify ?? classifyCounter;
    this.label = options.label ?? "SensorStateTracker";
  }

  static batteryDeviceKey(serial: string, batteryKey: string): string {
    return `${serial}:${batteryKey}`;
  }

  private stateKey(deviceKey: string, sensorKey: string): string {
    return `${deviceKey}|${sensorKey}`;
  }

  /**
   * Value to expose for a sensor, given the raw snapshot value
   */
  track(
    deviceKey: string,
    sensorKey: string,
    value: SensorValue | undefined,
  ): SensorValue | null {
    const counterClass = this.classify(sensorKey);
    if (counterClass === null) {
      return value ?? null;
    }

    const key = this.stateKey(deviceKey, sensorKey);
    const state = this.states.get(key);
    const numeric = toNumber(value);

    if (numeric === null) {
      return state ? state.lastValidValue : null;
    }

    const today = getLocalDateString(this.timezone(), this.clock());

    if (!state) {
      this.states.set(key, {
        lastValidValue: numeric,
        lastUpdateDate: today,
        acceptNext: false,
      });
      return numeric;
    }

    if (counterClass === "lifetime") {
      return this.applyLifetime(key, state, numeric, today);
    }
    return this.applyDaily(key, state, numeric, today);
  }

  private applyLifetime(
    key: string,
    state: SensorTrackingState,
    value: number,
    today: string,
  ): number {
    if (value < state.lastValidValue) {
      console.warn(
        `[${this.label}] Rejected decrease for ${key}: ${value} < ${state.lastValidValue}`,
      );
      return state.lastValidValue;
    }

    state.lastValidValue = value;
    state.lastUpdateDate = today;
    return value;
  }

  private applyDaily(
    key: string,
    state: SensorTrackingState,
    value: number,
    today: string,
  ): number {
    if (state.lastUpdateDate !== today) {
      console.log(
        `[${this.label}] Date rollover ${state.lastUpdateDate} -> ${today} for ${key}, resetting to 0`,
      );
      state.lastValidValue = 0;
      state.lastUpdateDate = today;
      state.acceptNext = true;
      return 0;
    }

    if (state.acceptNext || value === 0 || value >= state.lastValidValue) {
      state.acceptNext = false;
      state.lastValidValue = value;
      return value;
    }

    console.warn(
      `[${this.label}] Rejected same-day decrease for ${key}: ${value} < ${state.lastValidValue}`,
    );
    return state.lastValidValue;
  }

  getState(deviceKey: string, sensorKey: string): SensorTrackingState | undefined {
    const state = this.states.get(this.stateKey(deviceKey, sensorKey));
    return state ? { ...state } : undefined;
  }

  get size(): number {
    return this.states.size;
  }

  clear(): void {
    this.states.clear();
  }
}
