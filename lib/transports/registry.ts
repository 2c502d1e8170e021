import { MODBUS_CONFIG } from "@/config";
import { TransportNotInstalledError, ValidationError } from "@/lib/errors";
import { CloudHttpTransport } from "./http/cloud-transport";
import { ModbusTcpTransport } from "./modbus/modbus-transport";
import type {
  DeviceTransport,
  ProbeResult,
  TransportEndpoint,
  TransportKind,
} from "./types";

export type TransportFactory = (endpoint: TransportEndpoint) => DeviceTransport;

function requireHost(endpoint: TransportEndpoint): string {
  if (!endpoint.host) {
    throw new ValidationError(`A host is required for ${endpoint.kind}`, {
      host: "required",
    });
  }
  return endpoint.host;
}

/**
 * Registry for transport drivers.
 * The dongle driver is not bundled; installing it means registering a factory.
 */
export class TransportRegistry {
  private static factories = new Map<TransportKind, TransportFactory>();
  private static initialized = false;

  private static initialize() {
    if (this.initialized) return;

    this.factories.set("http", (endpoint) => {
      if (!endpoint.username || !endpoint.password) {
        throw new ValidationError("Cloud credentials are required", {
          username: endpoint.username ? "" : "required",
          password: endpoint.password ? "" : "required",
        });
      }
      return new CloudHttpTransport(
        {
          username: endpoint.username,
          password: endpoint.password,
          baseUrl: endpoint.baseUrl,
          verifySsl: endpoint.verifySsl,
        },
        endpoint.timeoutMs,
      );
    });

    this.factories.set(
      "modbus",
      (endpoint) =>
        new ModbusTcpTransport({
          host: requireHost(endpoint),
          port: endpoint.port,
          unitId: endpoint.unitId,
          timeoutMs: endpoint.timeoutMs,
        }),
    );

    this.initialized = true;

    console.log(
      "[TransportRegistry] Initialized with drivers:",
      Array.from(this.factories.keys()).join(", "),
    );
  }

  /**
   * Register a driver (the dongle driver, or a fake in tests)
   */
  static registerFactory(kind: TransportKind, factory: TransportFactory) {
    this.initialize();
    this.factories.set(kind, factory);
    console.log(`[TransportRegistry] Registered driver for ${kind}`);
  }

  static unregister(kind: TransportKind) {
    this.initialize();
    this.factories.delete(kind);
  }

  static isInstalled(kind: TransportKind): boolean {
    this.initialize();
    return this.factories.has(kind);
  }

  static getInstalledKinds(): TransportKind[] {
    this.initialize();
    return Array.from(this.factories.keys());
  }

  /**
   * Build a transport for an endpoint
   * @throws TransportNotInstalledError when no driver is registered
   */
  static create(endpoint: TransportEndpoint): DeviceTransport {
    this.initialize();
    const factory = this.factories.get(endpoint.kind);
    if (!factory) {
      throw new TransportNotInstalledError(endpoint.kind);
    }
    return factory(endpoint);
  }

  /**
   * Connect to a local transport and read what identifies the device.
   * Errors propagate unchanged so callers can map them to form errors.
   */
  static async probe(endpoint: TransportEndpoint): Promise<ProbeResult> {
    const transport = this.create({
      timeoutMs: MODBUS_CONFIG.probeTimeoutMs,
      ...endpoint,
    });

    try {
      await transport.connect();

      const result: ProbeResult = {};
      if (transport instanceof ModbusTcpTransport) {
        const serial = await transport.readSerialNumber();
        if (serial) result.detectedSerial = serial;
      }

      const serial = result.detectedSerial ?? endpoint.inverterSerial;
      if (serial) {
        result.deviceTypeCode = await transport.readDeviceType(serial);
        result.firmwareVersion = await transport.readFirmwareVersion(serial);
      }

      console.log(
        `[TransportRegistry] Probe of ${endpoint.kind} ${endpoint.host ?? ""} succeeded` +
          (result.detectedSerial ? ` (serial ${result.detectedSerial})` : ""),
      );
      return result;
    } finally {
      await transport.disconnect();
    }
  }

  /**
   * Reset to the bundled drivers (tests)
   */
  static reset() {
    this.factories.clear();
    this.initialized = false;
  }
}
