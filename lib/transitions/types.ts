import type { ProbeResult, TransportEndpoint } from "@/lib/transports/types";
import type {
  ConnectionType,
  FleetEntry,
  FleetEntryData,
  LocalTransportConfig,
  LocalType,
} from "@/lib/types/fleet-entry";

export type TransitionType =
  | "http_to_hybrid"
  | "hybrid_to_http"
  | "modbus_to_dongle"
  | "dongle_to_modbus";

/** Either side of a transition: a connection mode or a local transport kind */
export type TransitionSide = ConnectionType | LocalType;

export interface TransitionRequest {
  sourceType: TransitionSide;
  targetType: TransitionSide;
  entry: FleetEntry;
}

const TRANSITION_TYPES: readonly TransitionType[] = [
  "http_to_hybrid",
  "hybrid_to_http",
  "modbus_to_dongle",
  "dongle_to_modbus",
];

export function transitionTypeOf(request: TransitionRequest): TransitionType | null {
  const key = `${request.sourceType}_to_${request.targetType}`;
  return TRANSITION_TYPES.find((type) => type === key) ?? null;
}

export type CloudCredentials = Partial<
  Pick<
    FleetEntryData,
    "username" | "password" | "baseUrl" | "verifySsl" | "plantId" | "plantName"
  >
>;

export interface TransitionContext {
  validatedCredentials: CloudCredentials;
  localTransportConfig?: LocalTransportConfig;
  probeResult?: ProbeResult;
  warnings: string[];
}

export type FormValues = Record<string, string | number | boolean | undefined>;

export type FlowResult =
  | {
      type: "form";
      stepId: string;
      errors: Record<string, string>;
      placeholders: Record<string, string>;
      values: FormValues;
    }
  | {
      type: "abort";
      reason: string;
      placeholders: Record<string, string>;
    }
  | {
      type: "success";
      reason: "transition_successful";
      entry: FleetEntry;
      placeholders: Record<string, string>;
    };

/**
 * What a transition needs from its host: the entry store, the runtime and the
 * transport prober
 */
export interface TransitionHost {
  updateEntry(
    entryId: string,
    update: { title?: string; data: FleetEntryData },
  ): Promise<FleetEntry>;
  reloadEntry(entryId: string): Promise<void>;
  probe(endpoint: TransportEndpoint): Promise<ProbeResult>;
}

export interface TransitionRouterHost extends TransitionHost {
  getEntry(entryId: string): Promise<FleetEntry | null>;
}
