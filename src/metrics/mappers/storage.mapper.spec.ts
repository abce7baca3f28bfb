import { DeviceId } from '../../fronius';
import { collectStorageData, toStorageRecord } from './storage.mapper';
import { storageRealtimeData } from '../../../test/utils/fronius-fixtures';
import { createMockFroniusApi } from '../../../test/utils/mock-fronius-api';

const CAPTURED_AT = 1_760_000_000_123_000_000n;

describe('storage mapper', () => {
  describe('toStorageRecord', () => {
    it('should hoist the controller fields', () => {
      const record = toStorageRecord(storageRealtimeData(), CAPTURED_AT);

      expect(record).toEqual({
        device: 'Storage',
        enabled: true,
        chargePercentage: 76.5,
        capacity: 11520,
        dcCurrent: -4.2,
        dcVoltage: 412.8,
        temperatureCell: 24.5,
        time: CAPTURED_AT,
      });
    });

    it('should report a disabled controller', () => {
      const data = storageRealtimeData();
      const record = toStorageRecord(
        { Controller: { ...data.Controller, Enable: 0 } },
        CAPTURED_AT,
      );

      expect(record.enabled).toBe(false);
    });
  });

  describe('collectStorageData', () => {
    it('should query the given storage device', async () => {
      const client = createMockFroniusApi();
      client.getStorageRealtimeData.mockResolvedValue(storageRealtimeData());
      const deviceId = DeviceId.from(0);

      const record = await collectStorageData(
        client,
        deviceId,
        () => CAPTURED_AT,
      );

      expect(client.getStorageRealtimeData).toHaveBeenCalledWith(deviceId);
      expect(record.chargePercentage).toBe(76.5);
    });
  });
});
