import {
  fleetEntryDataSchema,
  hasCloudCredentials,
  resolveDevices,
  resolveLocalTransports,
} from '@/lib/types/fleet-entry';

describe('fleetEntryDataSchema', () => {
  it('should default the device list', () => {
    const data = fleetEntryDataSchema.parse({ connectionType: 'http' });
    expect(data.devices).toEqual([]);
  });

  it('should reject an unknown connection type', () => {
    expect(fleetEntryDataSchema.safeParse({ connectionType: 'satellite' }).success).toBe(false);
  });

  it('should reject a local transport without a host', () => {
    const result = fleetEntryDataSchema.safeParse({
      connectionType: 'local',
      localTransports: [
        { serial: '4512670118', transportType: 'modbus_tcp', host: '', port: 502, inverterFamily: 'EG4_HYBRID' },
      ],
    });
    expect(result.success).toBe(false);
  });
});

describe('hasCloudCredentials', () => {
  it('should need both a username and a plant', () => {
    const complete = fleetEntryDataSchema.parse({ connectionType: 'http', username: 'test-user', plantId: '42' });
    const noPlant = fleetEntryDataSchema.parse({ connectionType: 'http', username: 'test-user' });

    expect(hasCloudCredentials(complete)).toBe(true);
    expect(hasCloudCredentials(noPlant)).toBe(false);
  });
});

describe('resolveLocalTransports', () => {
  it('should build a Modbus transport from the single-transport fields', () => {
    const data = fleetEntryDataSchema.parse({
      connectionType: 'hybrid',
      hybridLocalType: 'modbus',
      modbusHost: '192.168.1.50',
      inverterSerial: '4512670118',
    });

    expect(resolveLocalTransports(data)).toEqual([
      {
        serial: '4512670118',
        transportType: 'modbus_tcp',
        host: '192.168.1.50',
        port: 502,
        unitId: undefined,
        inverterFamily: '',
      },
    ]);
  });

  it('should build a dongle transport with the default port', () => {
    const data = fleetEntryDataSchema.parse({
      connectionType: 'local',
      hybridLocalType: 'dongle',
      dongleHost: '192.168.1.60',
      dongleSerial: 'BA12345678',
      inverterSerial: '4512670118',
      inverterFamily: 'EG4_OFFGRID',
    });

    const [transport] = resolveLocalTransports(data);
    expect(transport.transportType).toBe('wifi_dongle');
    expect(transport.port).toBe(8000);
    expect(transport.dongleSerial).toBe('BA12345678');
    expect(transport.inverterFamily).toBe('EG4_OFFGRID');
  });

  it('should prefer the transport list when one is stored', () => {
    const data = fleetEntryDataSchema.parse({
      connectionType: 'local',
      hybridLocalType: 'modbus',
      modbusHost: '192.168.1.50',
      localTransports: [
        { serial: '4512670119', transportType: 'modbus_tcp', host: '192.168.1.51', port: 502, inverterFamily: 'LXP' },
      ],
    });

    expect(resolveLocalTransports(data).map((transport) => transport.host)).toEqual(['192.168.1.51']);
  });

  it('should find nothing for a cloud-only entry', () => {
    expect(resolveLocalTransports(fleetEntryDataSchema.parse({ connectionType: 'http' }))).toEqual([]);
  });
});

describe('resolveDevices', () => {
  it('should keep a configured device list', () => {
    const data = fleetEntryDataSchema.parse({
      connectionType: 'hybrid',
      hybridLocalType: 'modbus',
      modbusHost: '192.168.1.50',
      inverterSerial: '4512670118',
      devices: [{ serial: '4524850115', type: 'gridboss' }],
    });

    expect(resolveDevices(data)).toEqual([{ serial: '4524850115', type: 'gridboss' }]);
  });

  it('should derive one inverter per local transport with a serial', () => {
    const data = fleetEntryDataSchema.parse({
      connectionType: 'local',
      localTransports: [
        {
          serial: '4512670118',
          transportType: 'modbus_tcp',
          host: '192.168.1.50',
          port: 502,
          inverterFamily: 'EG4_HYBRID',
          gridType: 'split_phase',
        },
        { serial: '', transportType: 'modbus_tcp', host: '192.168.1.51', port: 502, inverterFamily: 'EG4_HYBRID' },
      ],
    });

    expect(resolveDevices(data)).toEqual([
      { serial: '4512670118', type: 'inverter', gridType: 'split_phase' },
    ]);
  });
});
