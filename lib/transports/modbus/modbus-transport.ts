import ModbusRTU from "modbus-serial";
import { MODBUS_CONFIG } from "@/config";
import { ConnectionError, DecodingError, ValidationError, classifyError } from "@/lib/errors";
import {
  decodeAscii,
  decodeBlock,
  decodeFirmware,
  registerMap,
} from "./register-decoder";
import type { RegisterBlock } from "./register-decoder";
import type {
  DeviceTransport,
  EnergyReadOptions,
  RawBatteryPayload,
  RawFields,
} from "@/lib/transports/types";

export interface ModbusEndpoint {
  host: string;
  port?: number;
  unitId?: number;
  timeoutMs?: number;
}

/**
 * Modbus TCP transport for one inverter (or GridBOSS) behind an RS485 adapter.
 *
 * A socket is opened and closed around every call; the adapter accepts one
 * client at a time, so calls must not overlap.
 */
export class ModbusTcpTransport implements DeviceTransport {
  readonly kind = "modbus" as const;
  readonly label = "Modbus";
  readonly sessionSafe = false;
  readonly host: string;
  private port: number;
  private unitId: number;
  private timeoutMs: number;

  constructor(endpoint: ModbusEndpoint) {
    this.host = endpoint.host;
    this.port = endpoint.port ?? MODBUS_CONFIG.defaultPort;
    this.unitId = endpoint.unitId ?? MODBUS_CONFIG.defaultUnitId;
    this.timeoutMs = endpoint.timeoutMs ?? MODBUS_CONFIG.timeoutMs;
  }

  private async withClient<T>(action: (client: ModbusRTU) => Promise<T>): Promise<T> {
    const client = new ModbusRTU();
    client.setTimeout(this.timeoutMs);

    try {
      await client.connectTCP(this.host, { port: this.port });
      client.setID(this.unitId);
      return await action(client);
    } catch (error) {
      throw this.toTransportError(error);
    } finally {
      await this.close(client);
    }
  }

  private close(client: ModbusRTU): Promise<void> {
    if (!client.isOpen) return Promise.resolve();
    return new Promise((resolve) => {
      client.close(() => resolve());
    });
  }

  private toTransportError(error: unknown): Error {
    // modbus-serial reports timeouts as { name: "TransactionTimedOutError" }
    if (error instanceof Error && error.name === "TransactionTimedOutError") {
      return new ConnectionError(
        `Modbus ${this.host}:${this.port} timed out`,
        "timeout",
      );
    }
    return classifyError(error);
  }

  private async readInputBlock(block: RegisterBlock): Promise<RawFields> {
    return this.withClient(async (client) => {
      const result = await client.readInputRegisters(block.start, block.count);
      return decodeBlock(result.data, block);
    });
  }

  async connect(): Promise<void> {
    // Sockets are per call; connecting verifies reachability only.
    await this.withClient(async () => undefined);
  }

  async disconnect(): Promise<void> {
    // Nothing persistent to release.
  }

  readRuntime(_serial: string): Promise<RawFields> {
    return this.readInputBlock(registerMap.inputBlocks.runtime);
  }

  async readEnergy(_serial: string, options: EnergyReadOptions = {}): Promise<RawFields> {
    // Registers only cover the inverter itself; groups are summed from members
    if (options.aggregate) {
      throw new ValidationError(`Modbus ${this.host} cannot read parallel group energy`);
    }
    return this.readInputBlock(registerMap.inputBlocks.energy);
  }

  async readBattery(_serial: string): Promise<RawBatteryPayload> {
    const fields = await this.readInputBlock(registerMap.inputBlocks.battery);
    return { fields, units: [] };
  }

  readMidbox(_serial: string): Promise<RawFields> {
    return this.readInputBlock(registerMap.inputBlocks.midbox);
  }

  async readDeviceType(_serial: string): Promise<number> {
    return this.withClient(async (client) => {
      const result = await client.readHoldingRegisters(
        registerMap.holding.deviceType,
        1,
      );
      const [code] = result.data;
      if (code === undefined) {
        throw new DecodingError("Empty device type register", result.data);
      }
      return code;
    });
  }

  async readFirmwareVersion(_serial: string): Promise<string> {
    return this.withClient(async (client) => {
      const { firmwareStart, firmwareCount } = registerMap.holding;
      const result = await client.readHoldingRegisters(firmwareStart, firmwareCount);
      const firmware = decodeFirmware(result.data);
      if (!firmware) {
        throw new DecodingError("Firmware registers are empty", result.data);
      }
      return firmware;
    });
  }

  async readParallelConfig(_serial: string): Promise<number> {
    return this.withClient(async (client) => {
      const result = await client.readInputRegisters(
        registerMap.parallelConfigRegister,
        1,
      );
      const [config] = result.data;
      if (config === undefined) {
        throw new DecodingError("Empty parallel configuration register", result.data);
      }
      return config;
    });
  }

  /**
   * Serial number as stored in the inverter (used when probing)
   */
  async readSerialNumber(): Promise<string> {
    return this.withClient(async (client) => {
      const { start, count } = registerMap.serialNumber;
      const result = await client.readInputRegisters(start, count);
      return decodeAscii(result.data);
    });
  }
}
