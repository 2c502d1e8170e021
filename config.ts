// Configuration for the fleet poller

// Cloud API Configuration
export const API_CONFIG = {
  baseUrl: process.env.FLEET_CLOUD_BASE_URL || 'https://monitor.eg4electronics.com',
  loginEndpoint: '/WManage/api/login',
  plantListEndpoint: '/WManage/web/config/plant/list/viewer',
  runtimeEndpoint: '/WManage/api/inverter/getInverterRuntime',
  energyEndpoint: '/WManage/api/inverter/getInverterEnergyInfo',
  parallelEnergyEndpoint: '/WManage/api/inverter/getInverterEnergyInfoParallel',
  batteryEndpoint: '/WManage/api/battery/getBatteryInfo',
  midboxEndpoint: '/WManage/api/midbox/getMidboxRuntime',
  parallelGroupEndpoint: '/WManage/api/inverterOverview/getParallelGroupDetails',
  timeout: 30000,                     // 30 seconds timeout
  sessionTtlMs: 2 * 60 * 60 * 1000,   // Cloud sessions last 2 hours
  userAgent: 'FleetPoller/1.0',
} as const;

// Polling Configuration
export const POLLING_CONFIG = {
  cloudIntervalSeconds: 30,           // Cloud-only entries
  localIntervalSeconds: 5,            // Entries with a Modbus or dongle transport
  minIntervalSeconds: 5,
  maxIntervalSeconds: 300,
  callTimeoutMs: 10000,               // Per transport call
} as const;

// Local transport defaults
export const MODBUS_CONFIG = {
  defaultPort: 502,
  defaultUnitId: 1,
  timeoutMs: 5000,
  probeTimeoutMs: 5000,
} as const;

export const DONGLE_CONFIG = {
  defaultPort: 8000,
} as const;

// Shown whenever a device has not reported a firmware code
export const FIRMWARE_FALLBACK = '1.0.0';

export const BRAND_NAME = process.env.FLEET_BRAND_NAME || 'EG4';

export const DEFAULT_INVERTER_FAMILY = 'EG4_HYBRID';

// Error Messages
export const ERROR_MESSAGES = {
  AUTH_FAILED: 'Authentication failed. Please check credentials.',
  SESSION_EXPIRED: 'Session expired. Re-authenticating...',
  REAUTH_REQUIRED: 'Cloud credentials were rejected twice. Reauthentication required.',
  NETWORK_ERROR: 'Network error. Please check your connection.',
  TIMEOUT: 'Transport call timed out.',
  ALL_DEVICES_FAILED: 'Every device failed in this poll cycle.',
  POLL_CANCELLED: 'Poll cycle cancelled.',
} as const;

// Database Configuration
export const DATABASE_CONFIG = {
  url: process.env.DATABASE_URL || 'file:./fleet.db',
} as const;
