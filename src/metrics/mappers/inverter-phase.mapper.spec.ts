import { DeviceId, THREE_PHASE_INVERTER_DATA } from '../../fronius';
import {
  collectInverterPhaseData,
  toInverterPhaseRecord,
} from './inverter-phase.mapper';
import { threePhaseInverterData } from '../../../test/utils/fronius-fixtures';
import { createMockFroniusApi } from '../../../test/utils/mock-fronius-api';

const CAPTURED_AT = 1_760_000_000_123_000_000n;

describe('inverter phase mapper', () => {
  describe('toInverterPhaseRecord', () => {
    it('should map phase currents and phase voltages', () => {
      const record = toInverterPhaseRecord(
        threePhaseInverterData(),
        CAPTURED_AT,
      );

      expect(record).toEqual({
        device: 'Inverter',
        acL1Current: 0.81,
        acL2Current: 0.79,
        acL3Current: 0.8,
        l1Voltage: 230.1,
        l2Voltage: 231.4,
        l3Voltage: 229.8,
        time: CAPTURED_AT,
      });
    });

    it('should leave missing phases absent', () => {
      const record = toInverterPhaseRecord(
        {
          IAC_L1: { Unit: 'A', Value: 0.81 },
          UAC_L1: { Unit: 'V', Value: 230.1 },
        },
        CAPTURED_AT,
      );

      expect(record.acL1Current).toBe(0.81);
      expect(record.l1Voltage).toBe(230.1);
      expect(record.acL2Current).toBeUndefined();
      expect(record.acL3Current).toBeUndefined();
      expect(record.l2Voltage).toBeUndefined();
      expect(record.l3Voltage).toBeUndefined();
    });
  });

  describe('collectInverterPhaseData', () => {
    it('should query 3PInverterData for the given device', async () => {
      const client = createMockFroniusApi();
      client.getInverterRealtimeData.mockResolvedValue(
        threePhaseInverterData(),
      );
      const deviceId = DeviceId.from(1);

      const record = await collectInverterPhaseData(
        client,
        deviceId,
        () => CAPTURED_AT,
      );

      expect(client.getInverterRealtimeData).toHaveBeenCalledWith(
        deviceId,
        THREE_PHASE_INVERTER_DATA,
      );
      expect(record.acL2Current).toBe(0.79);
    });
  });
});
