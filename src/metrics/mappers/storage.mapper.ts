import { DeviceId, FroniusApi, StorageRealtimeData } from '../../fronius';
import { NanoClock, sealRecord, systemNanoClock } from '../metric-record';
import { StorageRecord } from '../metric-series';

/**
 * StorageRealtimeData -> storage (Controller fields hoisted to the top)
 */
export function toStorageRecord(
  data: StorageRealtimeData,
  time: bigint,
): Readonly<StorageRecord> {
  const { Controller: controller } = data;
  return sealRecord<StorageRecord>({
    device: 'Storage',
    enabled: controller.Enable > 0,
    chargePercentage: controller.StateOfCharge_Relative,
    capacity: controller.Capacity_Maximum,
    dcCurrent: controller.Current_DC,
    dcVoltage: controller.Voltage_DC,
    temperatureCell: controller.Temperature_Cell,
    time,
  });
}

export async function collectStorageData(
  client: FroniusApi,
  deviceId: DeviceId,
  clock: NanoClock = systemNanoClock,
): Promise<Readonly<StorageRecord>> {
  const data = await client.getStorageRealtimeData(deviceId);
  return toStorageRecord(data, clock());
}
