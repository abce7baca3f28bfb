import {
  DeviceId,
  FroniusApi,
  THREE_PHASE_INVERTER_DATA,
  ThreePhaseInverterData,
} from '../../fronius';
import { NanoClock, sealRecord, systemNanoClock } from '../metric-record';
import { InverterPhaseRecord } from '../metric-series';

/**
 * 3PInverterData -> inverter_phase
 */
export function toInverterPhaseRecord(
  data: ThreePhaseInverterData,
  time: bigint,
): Readonly<InverterPhaseRecord> {
  return sealRecord<InverterPhaseRecord>({
    device: 'Inverter',
    acL1Current: data.IAC_L1?.Value ?? undefined,
    acL2Current: data.IAC_L2?.Value ?? undefined,
    acL3Current: data.IAC_L3?.Value ?? undefined,
    l1Voltage: data.UAC_L1?.Value ?? undefined,
    l2Voltage: data.UAC_L2?.Value ?? undefined,
    l3Voltage: data.UAC_L3?.Value ?? undefined,
    time,
  });
}

export async function collectInverterPhaseData(
  client: FroniusApi,
  deviceId: DeviceId,
  clock: NanoClock = systemNanoClock,
): Promise<Readonly<InverterPhaseRecord>> {
  const data = await client.getInverterRealtimeData(
    deviceId,
    THREE_PHASE_INVERTER_DATA,
  );
  return toInverterPhaseRecord(data, clock());
}
