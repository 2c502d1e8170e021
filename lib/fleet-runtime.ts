import { EventEmitter } from "events";
import { FleetCoordinator } from "@/lib/coordinator/fleet-coordinator";
import type { FleetCoordinatorDeps } from "@/lib/coordinator/fleet-coordinator";
import type { PollCycleResult } from "@/lib/coordinator/types";
import { FleetEntriesManager } from "@/lib/fleet-entries-manager";
import { FleetEntryNotFoundError } from "@/lib/errors";
import { TransitionRouter } from "@/lib/transitions/transition-router";
import type { TransitionRouterHost } from "@/lib/transitions/types";
import { TransportRegistry } from "@/lib/transports/registry";
import type { ProbeResult, TransportEndpoint } from "@/lib/transports/types";
import type { FleetEntry, FleetEntryData } from "@/lib/types/fleet-entry";
import type { Snapshot } from "@/lib/types/snapshot";

export interface FleetRuntimeOptions {
  /** Start each coordinator's interval on load (off for one-shot CLI runs) */
  autoStart?: boolean;
  coordinatorDeps?: Omit<FleetCoordinatorDeps, "recorder" | "tracker">;
  probe?: (endpoint: TransportEndpoint) => Promise<ProbeResult>;
}

/**
 * Owns one FleetCoordinator per loaded entry and hosts connection
 * transitions against the entry store.
 *
 * Events: "snapshot" (entryId, snapshot), "cycle" (entryId, result) and
 * "reauth-required" (entryId).
 */
export class FleetRuntime extends EventEmitter implements TransitionRouterHost {
  private coordinators: Map<string, FleetCoordinator> = new Map();
  private autoStart: boolean;
  private coordinatorDeps: Omit<FleetCoordinatorDeps, "recorder" | "tracker">;
  private prober: (endpoint: TransportEndpoint) => Promise<ProbeResult>;

  constructor(
    private entries: FleetEntriesManager = new FleetEntriesManager(),
    options: FleetRuntimeOptions = {},
  ) {
    super();
    this.autoStart = options.autoStart ?? true;
    this.coordinatorDeps = options.coordinatorDeps ?? {};
    this.prober = options.probe ?? ((endpoint) => TransportRegistry.probe(endpoint));
  }

  getCoordinator(entryId: string): FleetCoordinator | undefined {
    return this.coordinators.get(entryId);
  }

  getLoadedEntryIds(): string[] {
    return Array.from(this.coordinators.keys());
  }

  /**
   * Load every stored entry
   */
  async loadAll(): Promise<void> {
    const entries = await this.entries.listEntries();
    for (const entry of entries) {
      await this.load(entry.id);
    }
    console.log(`[FleetRuntime] Loaded ${entries.length} entries`);
  }

  /**
   * Create and start the coordinator for an entry
   */
  async load(entryId: string): Promise<FleetCoordinator> {
    const existing = this.coordinators.get(entryId);
    if (existing) return existing;

    const entry = await this.entries.getEntry(entryId);
    if (!entry) {
      throw new FleetEntryNotFoundError(entryId);
    }

    const coordinator = new FleetCoordinator(entry, {
      ...this.coordinatorDeps,
      recorder: this.entries,
    });
    coordinator.on("snapshot", (snapshot: Snapshot) => this.emit("snapshot", entryId, snapshot));
    coordinator.on("cycle", (result: PollCycleResult) => this.emit("cycle", entryId, result));
    coordinator.on("reauth-required", () => {
      console.warn(`[FleetRuntime] Entry ${entryId} needs new cloud credentials`);
      this.emit("reauth-required", entryId);
    });

    this.coordinators.set(entryId, coordinator);
    if (this.autoStart) {
      coordinator.start();
    }

    console.log(`[FleetRuntime] Loaded entry ${entryId} (${entry.data.connectionType})`);
    return coordinator;
  }

  /**
   * Stop an entry's coordinator and release its transports
   */
  async unload(entryId: string): Promise<boolean> {
    const coordinator = this.coordinators.get(entryId);
    if (!coordinator) return false;

    this.coordinators.delete(entryId);
    await coordinator.shutdown();
    coordinator.removeAllListeners();

    console.log(`[FleetRuntime] Unloaded entry ${entryId}`);
    return true;
  }

  async reloadEntry(entryId: string): Promise<void> {
    await this.unload(entryId);
    await this.load(entryId);
  }

  async shutdown(): Promise<void> {
    for (const entryId of this.getLoadedEntryIds()) {
      await this.unload(entryId);
    }
    console.log("[FleetRuntime] Stopped");
  }

  transitions(entryId: string): TransitionRouter {
    return new TransitionRouter(entryId, this);
  }

  getEntry(entryId: string): Promise<FleetEntry | null> {
    return this.entries.getEntry(entryId);
  }

  updateEntry(
    entryId: string,
    update: { title?: string; data: FleetEntryData },
  ): Promise<FleetEntry> {
    return this.entries.updateEntry(entryId, update);
  }

  probe(endpoint: TransportEndpoint): Promise<ProbeResult> {
    return this.prober(endpoint);
  }
}
