import { BRAND_NAME } from "@/config";
import { ConnectionError, TransportNotInstalledError } from "@/lib/errors";
import { CLOUD_CREDENTIAL_KEYS } from "@/lib/types/fleet-entry";
import type { ConnectionType, FleetEntry, FleetEntryData, LocalType } from "@/lib/types/fleet-entry";
import type {
  CloudCredentials,
  FlowResult,
  FormValues,
  TransitionContext,
  TransitionHost,
  TransitionRequest,
  TransitionType,
} from "./types";

const MODE_TITLES: Record<string, string> = {
  http: "Web Monitor",
  modbus: "Modbus",
  dongle: "Dongle",
  hybrid: "Hybrid",
  local: "Local",
};

export const CONNECTION_TYPE_LABELS: Record<ConnectionType, string> = {
  http: "Cloud API (HTTP)",
  hybrid: "Hybrid (Cloud + Local)",
  local: "Local Only",
};

export const POLLING_WARNING =
  "Local transport will enable 5-second polling (vs 30s for cloud-only). " +
  "This provides faster updates but increases local network traffic.";

/**
 * Title for an entry in a given mode, e.g. "EG4 Hybrid - My Plant"
 */
export function formatEntryTitle(mode: string, name: string): string {
  const modeTitle = MODE_TITLES[mode] ?? mode.charAt(0).toUpperCase() + mode.slice(1);
  return `${BRAND_NAME} ${modeTitle} - ${name}`;
}

/**
 * Form error code for a failed connectivity probe
 */
export function probeErrorCode(localType: LocalType, error: unknown): string {
  if (error instanceof TransportNotInstalledError) {
    return `${localType}_not_installed`;
  }
  if (error instanceof ConnectionError) {
    return error.reason === "timeout"
      ? `${localType}_timeout`
      : `${localType}_connection_failed`;
  }
  return "unknown";
}

/**
 * Cloud fields of an entry, kept aside so no transition can lose them
 */
export function pickCloudCredentials(data: FleetEntryData): CloudCredentials {
  const credentials: CloudCredentials = {};
  for (const key of CLOUD_CREDENTIAL_KEYS) {
    if (data[key] !== undefined) {
      Object.assign(credentials, { [key]: data[key] });
    }
  }
  return credentials;
}

/**
 * Base for connection transitions: validate, then collectInput until the
 * confirm step, then execute.
 *
 * Nothing is written before execute(); abandoning a builder leaves the entry
 * untouched.
 */
export abstract class TransitionBuilder {
  abstract readonly transitionType: TransitionType;
  /** Step shown when the flow is entered without a step */
  abstract readonly initialStep: string;

  readonly context: TransitionContext;
  protected currentStep?: string;
  private confirmShown = false;

  constructor(
    protected request: TransitionRequest,
    protected host: TransitionHost,
  ) {
    this.context = {
      validatedCredentials: pickCloudCredentials(request.entry.data),
      warnings: [],
    };
  }

  get entry(): FleetEntry {
    return this.request.entry;
  }

  get step(): string {
    return this.currentStep ?? this.initialStep;
  }

  /**
   * Check preconditions. Returns false instead of throwing.
   */
  abstract validate(): boolean;

  abstract collectInput(stepId: string, input?: FormValues): Promise<FlowResult>;

  /** Entry data after the transition */
  protected abstract buildData(): FleetEntryData;

  /** Mode used for the new entry title */
  protected abstract readonly targetTitleMode: string;

  /** Label of the new mode, shown on success */
  protected abstract readonly targetLabel: string;

  addWarning(warning: string): void {
    if (!this.context.warnings.includes(warning)) {
      this.context.warnings.push(warning);
    }
  }

  protected warningsText(): string {
    return this.context.warnings.map((warning) => `• ${warning}`).join("\n");
  }

  protected form(
    stepId: string,
    placeholders: Record<string, string> = {},
    errors: Record<string, string> = {},
    values: FormValues = {},
  ): FlowResult {
    this.currentStep = stepId;
    return {
      type: "form",
      stepId,
      errors,
      placeholders: { brand_name: BRAND_NAME, ...placeholders },
      values,
    };
  }

  /**
   * Confirmation form. Must be shown before execute() is allowed.
   */
  protected confirmForm(stepId: string, placeholders: Record<string, string>): FlowResult {
    this.confirmShown = true;
    return this.form(stepId, {
      ...placeholders,
      warnings: this.warningsText() || "No warnings.",
    });
  }

  /**
   * Forget an earlier confirmation. The confirm form has to be shown again
   * before execute() accepts a submission.
   */
  protected resetConfirmation(): void {
    this.confirmShown = false;
  }

  /** Whether everything buildData() needs has been collected */
  protected isComplete(): boolean {
    return true;
  }

  /** Step to send the user back to when a submission arrives too early */
  protected incompleteStep(): string {
    return this.step;
  }

  protected plantName(): string {
    return this.entry.data.plantName ?? this.entry.data.stationName ?? "Unknown";
  }

  protected logStart(): void {
    console.log(
      `[Transition] Starting ${this.request.sourceType} -> ${this.request.targetType} for entry ${this.entry.id}`,
    );
  }

  /**
   * Write the new configuration in one update, then reload the entry.
   * A submission before the confirm form was shown re-shows a form instead.
   */
  async execute(): Promise<FlowResult> {
    if (!this.confirmShown || !this.isComplete()) {
      console.warn(
        `[Transition] Confirmation for entry ${this.entry.id} arrived before the flow was complete`,
      );
      return this.form(this.incompleteStep(), {}, { base: "confirmation_required" });
    }

    // Cloud credentials always survive, whatever buildData() did
    const data: FleetEntryData = {
      ...this.buildData(),
      ...this.context.validatedCredentials,
    };
    const title = formatEntryTitle(this.targetTitleMode, this.plantName());

    const entry = await this.host.updateEntry(this.entry.id, { title, data });
    await this.host.reloadEntry(this.entry.id);

    console.log(
      `[Transition] ${this.request.sourceType} -> ${this.request.targetType} completed for entry ${this.entry.id}`,
    );

    return {
      type: "success",
      reason: "transition_successful",
      entry,
      placeholders: { brand_name: BRAND_NAME, new_type: this.targetLabel },
    };
  }
}
