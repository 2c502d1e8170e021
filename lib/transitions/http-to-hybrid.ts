import { hasCloudCredentials } from "@/lib/types/fleet-entry";
import type { FleetEntryData } from "@/lib/types/fleet-entry";
import { LocalTransportBuilder, withLocalTransport } from "./local-transport-builder";
import { LOCAL_TYPE_OPTIONS, parseForm, selectLocalTypeSchema } from "./schemas";
import { CONNECTION_TYPE_LABELS } from "./transition-builder";
import type { FlowResult, FormValues } from "./types";

/**
 * Cloud-only entry gains a Modbus or dongle transport.
 *
 * Steps: select local type, then the Modbus or dongle form (probed), then
 * confirm.
 */
export class HttpToHybridBuilder extends LocalTransportBuilder {
  static readonly STEP_SELECT_LOCAL_TYPE = "transition_select_local_type";
  static readonly STEP_MODBUS = "transition_modbus";
  static readonly STEP_DONGLE = "transition_dongle";
  static readonly STEP_CONFIRM = "transition_confirm";

  readonly transitionType = "http_to_hybrid" as const;
  readonly initialStep = HttpToHybridBuilder.STEP_SELECT_LOCAL_TYPE;
  protected readonly modbusStep = HttpToHybridBuilder.STEP_MODBUS;
  protected readonly dongleStep = HttpToHybridBuilder.STEP_DONGLE;
  protected readonly targetTitleMode = "hybrid";
  protected readonly targetLabel = CONNECTION_TYPE_LABELS.hybrid;

  validate(): boolean {
    const { data } = this.entry;

    if (data.connectionType !== "http") {
      console.warn(`[Transition] Cannot transition non-HTTP entry ${this.entry.id} to Hybrid`);
      return false;
    }
    if (!hasCloudCredentials(data)) {
      console.warn(
        `[Transition] Entry ${this.entry.id} missing required HTTP credentials for transition`,
      );
      return false;
    }

    this.logStart();
    return true;
  }

  async collectInput(stepId: string, input?: FormValues): Promise<FlowResult> {
    switch (stepId) {
      case HttpToHybridBuilder.STEP_SELECT_LOCAL_TYPE:
        return this.handleSelectLocalType(input);
      case HttpToHybridBuilder.STEP_MODBUS:
        return this.handleModbus(input);
      case HttpToHybridBuilder.STEP_DONGLE:
        return this.handleDongle(input);
      case HttpToHybridBuilder.STEP_CONFIRM:
        return input ? this.execute() : this.showConfirm();
      default:
        return this.handleSelectLocalType();
    }
  }

  private async handleSelectLocalType(input?: FormValues): Promise<FlowResult> {
    const placeholders = { current_plant: this.plantName() };
    if (!input) {
      return this.form(HttpToHybridBuilder.STEP_SELECT_LOCAL_TYPE, placeholders);
    }

    const parsed = parseForm(selectLocalTypeSchema, input);
    if (!parsed.ok) {
      return this.form(
        HttpToHybridBuilder.STEP_SELECT_LOCAL_TYPE,
        placeholders,
        parsed.errors,
        input,
      );
    }

    this.localType = parsed.value.hybridLocalType;
    return this.localType === "modbus" ? this.handleModbus() : this.handleDongle();
  }

  protected showConfirm(): FlowResult {
    return this.confirmForm(HttpToHybridBuilder.STEP_CONFIRM, {
      current_plant: this.plantName(),
      local_type: this.localType ? LOCAL_TYPE_OPTIONS[this.localType] : "Unknown",
    });
  }

  protected buildData(): FleetEntryData {
    const config = this.requireLocalConfig();
    const localType = config.transportType === "modbus_tcp" ? "modbus" : "dongle";
    return {
      ...withLocalTransport(this.entry.data, localType, config),
      connectionType: "hybrid",
    };
  }
}
