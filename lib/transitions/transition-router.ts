import { BRAND_NAME } from "@/config";
import type { FleetEntry } from "@/lib/types/fleet-entry";
import { HttpToHybridBuilder } from "./http-to-hybrid";
import { HybridToHttpBuilder } from "./hybrid-to-http";
import { LocalTransportSwapBuilder, currentLocalType } from "./local-transport-swap";
import { CONNECTION_TYPE_LABELS } from "./transition-builder";
import type { TransitionBuilder } from "./transition-builder";
import { transitionTypeOf } from "./types";
import type {
  FlowResult,
  FormValues,
  TransitionRequest,
  TransitionRouterHost,
  TransitionSide,
  TransitionType,
} from "./types";

export type TransitionOption =
  | "upgrade_to_hybrid"
  | "downgrade_to_http"
  | "switch_to_dongle"
  | "switch_to_modbus"
  | "no_change";

export const TRANSITION_OPTION_LABELS: Record<TransitionOption, string> = {
  upgrade_to_hybrid: "Add Local Transport (Hybrid Mode)",
  downgrade_to_http: "Remove Local Transport (Cloud Only)",
  switch_to_dongle: "Switch to WiFi Dongle",
  switch_to_modbus: "Switch to Modbus TCP",
  no_change: "Keep Current Configuration",
};

const OPTION_TARGETS: Record<Exclude<TransitionOption, "no_change">, TransitionSide> = {
  upgrade_to_hybrid: "hybrid",
  downgrade_to_http: "http",
  switch_to_dongle: "dongle",
  switch_to_modbus: "modbus",
};

export const STEP_TRANSITION_SELECT = "transition_select";

/**
 * Options offered for an entry's current mode
 */
export function transitionOptionsFor(entry: FleetEntry): TransitionOption[] {
  const localType = currentLocalType(entry.data);
  const swap: TransitionOption[] =
    localType === "modbus"
      ? ["switch_to_dongle"]
      : localType === "dongle"
        ? ["switch_to_modbus"]
        : [];

  switch (entry.data.connectionType) {
    case "http":
      return ["upgrade_to_hybrid", "no_change"];
    case "hybrid":
      return ["downgrade_to_http", ...swap, "no_change"];
    case "local":
      return [...swap, "no_change"];
  }
}

function isTransitionOption(value: unknown): value is TransitionOption {
  return typeof value === "string" && value in TRANSITION_OPTION_LABELS;
}

function abort(reason: string, placeholders: Record<string, string> = {}): FlowResult {
  return { type: "abort", reason, placeholders: { brand_name: BRAND_NAME, ...placeholders } };
}

/**
 * Routes one operator's transition flow for one entry to the builder for the
 * chosen transition. One builder is active at a time; it is dropped once the
 * transition completes or fails validation.
 */
export class TransitionRouter {
  private builder?: TransitionBuilder;

  constructor(
    private entryId: string,
    private host: TransitionRouterHost,
  ) {}

  get activeTransition(): TransitionType | undefined {
    return this.builder?.transitionType;
  }

  /**
   * Selection step: lists the options, or starts the chosen transition
   */
  async select(input?: FormValues): Promise<FlowResult> {
    const entry = await this.host.getEntry(this.entryId);
    if (!entry) return abort("entry_not_found");

    const options = transitionOptionsFor(entry);
    const choice = input?.transitionType;

    if (input && isTransitionOption(choice) && options.includes(choice)) {
      if (choice === "no_change") {
        return abort("no_change");
      }
      return this.begin(OPTION_TARGETS[choice]);
    }

    if (options.length <= 1) {
      return abort("transition_not_supported");
    }

    return {
      type: "form",
      stepId: STEP_TRANSITION_SELECT,
      errors: input ? { transitionType: "invalid" } : {},
      placeholders: {
        brand_name: BRAND_NAME,
        current_type: CONNECTION_TYPE_LABELS[entry.data.connectionType],
        options: options
          .map((option) => `${option}: ${TRANSITION_OPTION_LABELS[option]}`)
          .join("\n"),
      },
      values: { transitionType: "no_change" },
    };
  }

  /**
   * Start (or resume) the transition towards a mode or local transport kind
   */
  async begin(target: TransitionSide): Promise<FlowResult> {
    const entry = await this.host.getEntry(this.entryId);
    if (!entry) return abort("entry_not_found");

    const localTarget = target === "modbus" || target === "dongle";
    const source: TransitionSide | undefined = localTarget
      ? currentLocalType(entry.data)
      : entry.data.connectionType;
    if (!source) return abort("transition_not_supported");

    const request: TransitionRequest = { sourceType: source, targetType: target, entry };
    const transitionType = transitionTypeOf(request);
    if (!transitionType) return abort("transition_not_supported");

    let builder = this.builder;
    if (!builder || builder.transitionType !== transitionType) {
      builder = this.createBuilder(transitionType, request);
      if (!builder.validate()) {
        this.builder = undefined;
        return abort("transition_validation_failed");
      }
      this.builder = builder;
    }

    return this.step(builder.step);
  }

  /**
   * Submit (or show) a step of the active transition
   */
  async step(stepId: string, input?: FormValues): Promise<FlowResult> {
    const builder = this.builder;
    if (!builder) return abort("transition_not_started");

    const result = await builder.collectInput(stepId, input);
    if (result.type !== "form") {
      this.builder = undefined;
    }
    return result;
  }

  /**
   * Drop the active transition without writing anything
   */
  cancel(): void {
    if (this.builder) {
      console.log(`[TransitionRouter] Abandoned ${this.builder.transitionType} for ${this.entryId}`);
    }
    this.builder = undefined;
  }

  private createBuilder(type: TransitionType, request: TransitionRequest): TransitionBuilder {
    switch (type) {
      case "http_to_hybrid":
        return new HttpToHybridBuilder(request, this.host);
      case "hybrid_to_http":
        return new HybridToHttpBuilder(request, this.host);
      case "modbus_to_dongle":
        return new LocalTransportSwapBuilder(request, this.host, "dongle");
      case "dongle_to_modbus":
        return new LocalTransportSwapBuilder(request, this.host, "modbus");
    }
  }
}
