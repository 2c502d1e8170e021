import { hasCloudCredentials, resolveDevices } from "@/lib/types/fleet-entry";
import type { FleetEntryData } from "@/lib/types/fleet-entry";
import { withoutLocalTransport } from "./local-transport-builder";
import { CONNECTION_TYPE_LABELS, TransitionBuilder } from "./transition-builder";
import type { FlowResult, FormValues } from "./types";

/**
 * Hybrid entry drops its local transport and goes back to cloud-only polling
 */
export class HybridToHttpBuilder extends TransitionBuilder {
  static readonly STEP_CONFIRM_REMOVAL = "transition_confirm_removal";

  readonly transitionType = "hybrid_to_http" as const;
  readonly initialStep = HybridToHttpBuilder.STEP_CONFIRM_REMOVAL;
  protected readonly targetTitleMode = "http";
  protected readonly targetLabel = CONNECTION_TYPE_LABELS.http;

  private localDescription(): { label: string; host: string } {
    const { data } = this.entry;
    if (data.hybridLocalType === "modbus") {
      return { label: "Modbus TCP", host: data.modbusHost ?? "Unknown" };
    }
    if (data.hybridLocalType === "dongle") {
      return { label: "WiFi Dongle", host: data.dongleHost ?? "Unknown" };
    }
    return { label: "Unknown", host: "N/A" };
  }

  validate(): boolean {
    const { data } = this.entry;

    if (data.connectionType !== "hybrid") {
      console.warn(`[Transition] Cannot transition non-Hybrid entry ${this.entry.id} to HTTP`);
      return false;
    }
    if (!hasCloudCredentials(data)) {
      console.warn(
        `[Transition] Entry ${this.entry.id} has no cloud credentials to fall back on`,
      );
      return false;
    }

    this.logStart();

    const described =
      data.hybridLocalType === "modbus"
        ? "Modbus TCP"
        : data.hybridLocalType === "dongle"
          ? "WiFi Dongle"
          : "local transport";
    this.addWarning(
      `Removing ${described} will switch to cloud-only polling (30s intervals). ` +
        "Local transport provides faster 5-second updates.",
    );
    this.addWarning(
      "You can re-add local transport later by transitioning back to Hybrid mode.",
    );
    return true;
  }

  async collectInput(stepId: string, input?: FormValues): Promise<FlowResult> {
    if (stepId === HybridToHttpBuilder.STEP_CONFIRM_REMOVAL && input) {
      return this.execute();
    }

    const local = this.localDescription();
    return this.confirmForm(HybridToHttpBuilder.STEP_CONFIRM_REMOVAL, {
      current_plant: this.plantName(),
      local_type: local.label,
      local_host: local.host,
    });
  }

  protected buildData(): FleetEntryData {
    // Devices known only through the local transport stay polled over the cloud
    return {
      ...withoutLocalTransport(this.entry.data),
      connectionType: "http",
      devices: resolveDevices(this.entry.data),
    };
  }
}
