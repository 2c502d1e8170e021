import { resolveLocalTransports } from "@/lib/types/fleet-entry";
import type { FleetEntryData, LocalType } from "@/lib/types/fleet-entry";
import { LocalTransportBuilder, withLocalTransport } from "./local-transport-builder";
import { LOCAL_TYPE_OPTIONS } from "./schemas";
import type { FlowResult, FormValues, TransitionHost, TransitionRequest } from "./types";

const LOCAL_LABELS: Record<LocalType, string> = {
  modbus: "Modbus TCP",
  dongle: "WiFi Dongle",
};

/**
 * Current local transport kind of an entry, if it has exactly one
 */
export function currentLocalType(data: FleetEntryData): LocalType | undefined {
  if (data.hybridLocalType) return data.hybridLocalType;
  const [first] = resolveLocalTransports(data);
  if (!first) return undefined;
  return first.transportType === "modbus_tcp" ? "modbus" : "dongle";
}

/**
 * Replace a hybrid or local entry's Modbus transport with a dongle, or the
 * other way round. Connection mode, cloud credentials and devices are kept.
 */
export class LocalTransportSwapBuilder extends LocalTransportBuilder {
  static readonly STEP_MODBUS = "transition_modbus";
  static readonly STEP_DONGLE = "transition_dongle";
  static readonly STEP_CONFIRM = "transition_confirm";

  readonly transitionType: "modbus_to_dongle" | "dongle_to_modbus";
  readonly initialStep: string;
  protected readonly modbusStep = LocalTransportSwapBuilder.STEP_MODBUS;
  protected readonly dongleStep = LocalTransportSwapBuilder.STEP_DONGLE;
  protected readonly targetTitleMode: string;
  protected readonly targetLabel: string;

  private source: LocalType;
  private target: LocalType;

  constructor(
    request: TransitionRequest,
    host: TransitionHost,
    target: LocalType,
  ) {
    super(request, host);
    this.target = target;
    this.source = target === "modbus" ? "dongle" : "modbus";
    this.transitionType = target === "modbus" ? "dongle_to_modbus" : "modbus_to_dongle";
    this.initialStep = target === "modbus" ? this.modbusStep : this.dongleStep;
    this.targetTitleMode = request.entry.data.connectionType === "local" ? target : "hybrid";
    this.targetLabel = LOCAL_TYPE_OPTIONS[target];
  }

  validate(): boolean {
    const { data } = this.entry;

    if (data.connectionType === "http") {
      console.warn(
        `[Transition] Entry ${this.entry.id} has no local transport to switch`,
      );
      return false;
    }
    if (currentLocalType(data) !== this.source) {
      console.warn(
        `[Transition] Entry ${this.entry.id} does not use ${LOCAL_LABELS[this.source]}`,
      );
      return false;
    }

    this.logStart();
    return true;
  }

  protected probeWarning(): string {
    return (
      `Switching from ${LOCAL_LABELS[this.source]} to ${LOCAL_LABELS[this.target]}. ` +
      "Polling stays at 5-second intervals."
    );
  }

  /** Serial and family carried over from the current transport */
  private carriedValues(): FormValues {
    const [current] = resolveLocalTransports(this.entry.data);
    return {
      inverterSerial: current?.serial ?? this.entry.data.inverterSerial,
      inverterFamily: current?.inverterFamily || this.entry.data.inverterFamily,
    };
  }

  async collectInput(stepId: string, input?: FormValues): Promise<FlowResult> {
    if (stepId === LocalTransportSwapBuilder.STEP_CONFIRM) {
      return input ? this.execute() : this.showConfirm();
    }

    if (!input) {
      return this.form(this.initialStep, { current_plant: this.plantName() }, {}, this.carriedValues());
    }

    const merged = { ...this.carriedValues(), ...input };
    return this.target === "modbus" ? this.handleModbus(merged) : this.handleDongle(merged);
  }

  protected showConfirm(): FlowResult {
    return this.confirmForm(LocalTransportSwapBuilder.STEP_CONFIRM, {
      current_plant: this.plantName(),
      local_type: this.targetLabel,
    });
  }

  protected buildData(): FleetEntryData {
    return withLocalTransport(this.entry.data, this.target, this.requireLocalConfig());
  }
}
