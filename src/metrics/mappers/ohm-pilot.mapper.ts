import { DeviceId, FroniusApi, OhmPilotRealtimeData } from '../../fronius';
import { NanoClock, sealRecord, systemNanoClock } from '../metric-record';
import { OhmPilotRecord } from '../metric-series';

/**
 * OhmPilotRealtimeData -> ohm_pilot
 *
 * CodeOfError is only sent while the heater is faulted; its absence is
 * stored as 0.
 */
export function toOhmPilotRecord(
  data: OhmPilotRealtimeData,
  time: bigint,
): Readonly<OhmPilotRecord> {
  return sealRecord<OhmPilotRecord>({
    device: 'OhmPilot',
    state: String(data.CodeOfState),
    errorCode: data.CodeOfError ?? 0,
    power: data.PowerReal_PAC_Sum,
    temperature: data.Temperature_Channel_1,
    time,
  });
}

export async function collectOhmPilotData(
  client: FroniusApi,
  deviceId: DeviceId,
  clock: NanoClock = systemNanoClock,
): Promise<Readonly<OhmPilotRecord>> {
  const data = await client.getOhmPilotRealtimeData(deviceId);
  return toOhmPilotRecord(data, clock());
}
