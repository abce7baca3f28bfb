import {
  COMMON_INVERTER_DATA,
  CommonInverterData,
  DeviceId,
  FroniusApi,
} from '../../fronius';
import { NanoClock, sealRecord, systemNanoClock } from '../metric-record';
import { InverterRecord } from '../metric-series';

/**
 * CommonInverterData -> inverter
 *
 * Every channel is optional: an inverter in standby reports PAC only, or
 * nothing at all.
 */
export function toInverterRecord(
  data: CommonInverterData,
  time: bigint,
): Readonly<InverterRecord> {
  return sealRecord<InverterRecord>({
    device: 'Inverter',
    acPower: data.PAC?.Value ?? undefined,
    acPowerAbs: data.SAC?.Value ?? undefined,
    acCurrent: data.IAC?.Value ?? undefined,
    acVoltage: data.UAC?.Value ?? undefined,
    acFrequency: data.FAC?.Value ?? undefined,
    dcCurrent: data.IDC?.Value ?? undefined,
    dcVoltage: data.UDC?.Value ?? undefined,
    totalEnergy: data.TOTAL_ENERGY?.Value ?? undefined,
    time,
  });
}

export async function collectInverterData(
  client: FroniusApi,
  deviceId: DeviceId,
  clock: NanoClock = systemNanoClock,
): Promise<Readonly<InverterRecord>> {
  const data = await client.getInverterRealtimeData(
    deviceId,
    COMMON_INVERTER_DATA,
  );
  return toInverterRecord(data, clock());
}
