import { DeviceId, FroniusLookupError } from '../../fronius';
import {
  collectInverterInfo,
  toInverterInfoRecord,
} from './inverter-info.mapper';
import {
  inverterInfo,
  inverterInfoMap,
} from '../../../test/utils/fronius-fixtures';
import { createMockFroniusApi } from '../../../test/utils/mock-fronius-api';

const CAPTURED_AT = 1_760_000_000_123_000_000n;

describe('inverter info mapper', () => {
  describe('toInverterInfoRecord', () => {
    it('should map the info entry with coerced flags and codes', () => {
      const record = toInverterInfoRecord(inverterInfo(), CAPTURED_AT);

      expect(record).toEqual({
        device: 'Inverter',
        deviceType: 123,
        pvPower: 8200,
        name: 'Garage Symo',
        isVisualized: true,
        id: '38183',
        errorCode: 0,
        statusCode: '7',
        state: 'Running',
        time: CAPTURED_AT,
      });
    });

    it('should report a hidden inverter as not visualized', () => {
      const record = toInverterInfoRecord(
        { ...inverterInfo(), Show: 0 },
        CAPTURED_AT,
      );

      expect(record.isVisualized).toBe(false);
    });
  });

  describe('collectInverterInfo', () => {
    it('should pick the entry of the queried device', async () => {
      const client = createMockFroniusApi();
      client.getInverterInfo.mockResolvedValue({
        ...inverterInfoMap(),
        '2': { ...inverterInfo(), CustomName: 'Carport Primo' },
      });

      const record = await collectInverterInfo(
        client,
        DeviceId.from(2),
        () => CAPTURED_AT,
      );

      expect(record.name).toBe('Carport Primo');
    });

    it('should fail with a lookup error when the id is missing', async () => {
      const client = createMockFroniusApi();
      client.getInverterInfo.mockResolvedValue({ '2': inverterInfo() });

      await expect(
        collectInverterInfo(client, DeviceId.from(1), () => CAPTURED_AT),
      ).rejects.toThrow(
        new FroniusLookupError('GetInverterInfo.cgi', '1').message,
      );
    });

    it('should fail with a lookup error when the entry is null', async () => {
      const client = createMockFroniusApi();
      client.getInverterInfo.mockResolvedValue({ '1': null });

      await expect(
        collectInverterInfo(client, DeviceId.from(1), () => CAPTURED_AT),
      ).rejects.toBeInstanceOf(FroniusLookupError);
    });
  });
});
