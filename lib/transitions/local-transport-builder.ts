import { ValidationError } from "@/lib/errors";
import { LOCAL_TRANSPORT_KEYS } from "@/lib/types/fleet-entry";
import type { FleetEntryData, LocalTransportConfig, LocalType } from "@/lib/types/fleet-entry";
import { dongleFormSchema, modbusFormSchema, parseForm } from "./schemas";
import { POLLING_WARNING, TransitionBuilder, probeErrorCode } from "./transition-builder";
import type { FlowResult, FormValues } from "./types";

/**
 * Entry data with every local transport field removed
 */
export function withoutLocalTransport(data: FleetEntryData): FleetEntryData {
  const copy: FleetEntryData = { ...data };
  for (const key of LOCAL_TRANSPORT_KEYS) {
    delete copy[key];
  }
  return copy;
}

/**
 * Entry data carrying exactly one local transport
 */
export function withLocalTransport(
  data: FleetEntryData,
  localType: LocalType,
  config: LocalTransportConfig,
): FleetEntryData {
  const next: FleetEntryData = {
    ...withoutLocalTransport(data),
    hybridLocalType: localType,
    localTransports: [config],
    inverterSerial: config.serial,
    inverterFamily: config.inverterFamily,
  };

  if (localType === "modbus") {
    next.modbusHost = config.host;
    next.modbusPort = config.port;
    next.modbusUnitId = config.unitId;
  } else {
    next.dongleHost = config.host;
    next.donglePort = config.port;
    next.dongleSerial = config.dongleSerial;
  }
  return next;
}

/**
 * Shared Modbus and dongle configuration steps: parse the form, probe the
 * transport, then move on to confirmation. A failed probe re-shows the form
 * with the values already entered.
 */
export abstract class LocalTransportBuilder extends TransitionBuilder {
  protected localType?: LocalType;

  protected abstract readonly modbusStep: string;
  protected abstract readonly dongleStep: string;

  /** Confirmation form shown after a successful probe */
  protected abstract showConfirm(): FlowResult;

  /** Warning added once the new transport has been probed */
  protected probeWarning(): string {
    return POLLING_WARNING;
  }

  protected isComplete(): boolean {
    return this.context.localTransportConfig !== undefined && this.localType !== undefined;
  }

  protected incompleteStep(): string {
    if (this.localType === "modbus") {
      return this.modbusStep;
    }
    return this.localType === "dongle" ? this.dongleStep : this.initialStep;
  }

  /**
   * Drop the result of an earlier successful connection check so a later
   * failure cannot be confirmed with stale settings
   */
  private forgetLocalConfig(): void {
    this.context.localTransportConfig = undefined;
    this.context.probeResult = undefined;
    this.resetConfirmation();
  }

  protected requireLocalConfig(): LocalTransportConfig {
    const config = this.context.localTransportConfig;
    if (!config || !this.localType) {
      throw new ValidationError("No local transport has been configured");
    }
    return config;
  }

  protected async handleModbus(input?: FormValues): Promise<FlowResult> {
    if (!input) {
      return this.form(this.modbusStep);
    }

    const parsed = parseForm(modbusFormSchema, input);
    if (!parsed.ok) {
      return this.form(this.modbusStep, {}, parsed.errors, input);
    }

    const form = parsed.value;
    try {
      const probe = await this.host.probe({
        kind: "modbus",
        host: form.modbusHost,
        port: form.modbusPort,
        unitId: form.modbusUnitId,
        inverterSerial: form.inverterSerial || undefined,
      });
      this.context.probeResult = probe;

      const serial = form.inverterSerial || probe.detectedSerial || "";
      if (!form.inverterSerial && probe.detectedSerial) {
        console.log(`[Transition] Using detected inverter serial ${probe.detectedSerial}`);
      }

      this.localType = "modbus";
      this.context.localTransportConfig = {
        serial,
        transportType: "modbus_tcp",
        host: form.modbusHost,
        port: form.modbusPort,
        unitId: form.modbusUnitId,
        inverterFamily: form.inverterFamily,
        deviceTypeCode: probe.deviceTypeCode,
      };
      this.addWarning(this.probeWarning());
      return this.showConfirm();
    } catch (error) {
      console.error(`[Transition] Modbus probe of ${form.modbusHost} failed:`, error);
      this.forgetLocalConfig();
      return this.form(
        this.modbusStep,
        {},
        { base: probeErrorCode("modbus", error) },
        input,
      );
    }
  }

  protected async handleDongle(input?: FormValues): Promise<FlowResult> {
    if (!input) {
      return this.form(this.dongleStep);
    }

    const parsed = parseForm(dongleFormSchema, input);
    if (!parsed.ok) {
      return this.form(this.dongleStep, {}, parsed.errors, input);
    }

    const form = parsed.value;
    try {
      const probe = await this.host.probe({
        kind: "dongle",
        host: form.dongleHost,
        port: form.donglePort,
        dongleSerial: form.dongleSerial,
        inverterSerial: form.inverterSerial,
      });
      this.context.probeResult = probe;

      this.localType = "dongle";
      this.context.localTransportConfig = {
        serial: form.inverterSerial,
        transportType: "wifi_dongle",
        host: form.dongleHost,
        port: form.donglePort,
        dongleSerial: form.dongleSerial,
        inverterFamily: form.inverterFamily,
        deviceTypeCode: probe.deviceTypeCode,
      };
      this.addWarning(this.probeWarning());
      return this.showConfirm();
    } catch (error) {
      console.error(`[Transition] Dongle probe of ${form.dongleHost} failed:`, error);
      this.forgetLocalConfig();
      return this.form(
        this.dongleStep,
        {},
        { base: probeErrorCode("dongle", error) },
        input,
      );
    }
  }
}
