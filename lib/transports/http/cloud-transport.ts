import { API_CONFIG } from "@/config";
import { DecodingError } from "@/lib/errors";
import { isRecord, recordArray } from "@/lib/json";
import { toNumber } from "@/lib/mapping/field-mapper";
import { CloudClient } from "./cloud-client";
import type { CloudCredentials } from "./cloud-client";
import type {
  CloudTransport,
  EnergyReadOptions,
  RawBatteryPayload,
  RawFields,
  RequestStats,
  StationInfo,
} from "@/lib/transports/types";

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/**
 * Cloud monitor API exposed through the transport capability contract
 */
export class CloudHttpTransport implements CloudTransport {
  readonly kind = "http" as const;
  readonly label = "Cloud";
  readonly sessionSafe = true;
  readonly host: string;
  private client: CloudClient;

  constructor(credentials: CloudCredentials, timeoutMs?: number) {
    this.client = new CloudClient(credentials, timeoutMs);
    this.host = credentials.baseUrl || API_CONFIG.baseUrl;
  }

  async connect(): Promise<void> {
    await this.client.login();
  }

  async disconnect(): Promise<void> {
    this.client.logout();
  }

  private read(endpoint: string, serial: string): Promise<RawFields> {
    return this.client.post(endpoint, { serialNum: serial });
  }

  readRuntime(serial: string): Promise<RawFields> {
    return this.read(API_CONFIG.runtimeEndpoint, serial);
  }

  readEnergy(serial: string, options: EnergyReadOptions = {}): Promise<RawFields> {
    return this.read(
      options.aggregate ? API_CONFIG.parallelEnergyEndpoint : API_CONFIG.energyEndpoint,
      serial,
    );
  }

  async readBattery(serial: string): Promise<RawBatteryPayload> {
    const response = await this.read(API_CONFIG.batteryEndpoint, serial);
    const { batteryArray, ...bank } = response;

    return {
      fields: bank,
      units: recordArray(batteryArray).map((unit, index) => ({
        key:
          optionalString(unit.batteryKey) ??
          optionalString(unit.batterySn) ??
          String(index + 1),
        fields: unit,
      })),
    };
  }

  async readMidbox(serial: string): Promise<RawFields> {
    const response = await this.read(API_CONFIG.midboxEndpoint, serial);
    const { midboxData, ...rest } = response;
    if (!isRecord(midboxData)) {
      throw new DecodingError(`No midbox data for ${serial}`, response);
    }
    return { ...midboxData, fwCode: rest.fwCode ?? midboxData.fwCode };
  }

  async readDeviceType(serial: string): Promise<number> {
    const runtime = await this.readRuntime(serial);
    const code = toNumber(runtime.deviceType);
    if (code === null) {
      throw new DecodingError(`No device type reported for ${serial}`, runtime);
    }
    return code;
  }

  async readFirmwareVersion(serial: string): Promise<string> {
    const runtime = await this.readRuntime(serial);
    const code = optionalString(runtime.fwCode);
    if (!code) {
      throw new DecodingError(`No firmware code reported for ${serial}`, runtime);
    }
    return code;
  }

  async readParallelConfig(serial: string): Promise<number> {
    const details = await this.read(API_CONFIG.parallelGroupEndpoint, serial);
    const config = toNumber(details.parallelConfig);
    if (config === null) {
      throw new DecodingError(`No parallel configuration for ${serial}`, details);
    }
    return config;
  }

  async readStation(plantId: string): Promise<StationInfo> {
    const response = await this.client.post(API_CONFIG.plantListEndpoint, {
      sort: "createDate",
      order: "desc",
      searchText: "",
    });

    const plant = recordArray(response.rows).find(
      (row) => String(row.plantId) === plantId,
    );
    if (!plant) {
      throw new DecodingError(`Plant ${plantId} not in plant list`, response);
    }

    const timezone = optionalString(plant.timezone);
    this.client.setTimezone(timezone);

    return {
      name: optionalString(plant.name) ?? plantId,
      country: optionalString(plant.country),
      timezone,
      address: optionalString(plant.address),
    };
  }

  getRequestStats(): RequestStats {
    return this.client.getRequestStats();
  }
}
