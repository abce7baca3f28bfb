import { DeviceId, FroniusApi, MeterRealtimeData } from '../../fronius';
import { NanoClock, sealRecord, systemNanoClock } from '../metric-record';
import { MeterRecord } from '../metric-series';

/**
 * MeterRealtimeData -> meter
 *
 * Single-phase meters leave the L2/L3 and phase-to-phase channels out;
 * total power and average frequency are always reported.
 */
export function toMeterRecord(
  data: MeterRealtimeData,
  time: bigint,
): Readonly<MeterRecord> {
  return sealRecord<MeterRecord>({
    device: 'Meter',
    l1Current: data.Current_AC_Phase_1 ?? undefined,
    l2Current: data.Current_AC_Phase_2 ?? undefined,
    l3Current: data.Current_AC_Phase_3 ?? undefined,
    current: data.Current_AC_Sum ?? undefined,
    l1Voltage: data.Voltage_AC_Phase_1 ?? undefined,
    l2Voltage: data.Voltage_AC_Phase_2 ?? undefined,
    l3Voltage: data.Voltage_AC_Phase_3 ?? undefined,
    l12Voltage: data.Voltage_AC_PhaseToPhase_12 ?? undefined,
    l23Voltage: data.Voltage_AC_PhaseToPhase_23 ?? undefined,
    l31Voltage: data.Voltage_AC_PhaseToPhase_31 ?? undefined,
    l1Power: data.PowerReal_P_Phase_1 ?? undefined,
    l2Power: data.PowerReal_P_Phase_2 ?? undefined,
    l3Power: data.PowerReal_P_Phase_3 ?? undefined,
    power: data.PowerReal_P_Sum,
    frequencyAverage: data.Frequency_Phase_Average,
    time,
  });
}

export async function collectMeterData(
  client: FroniusApi,
  deviceId: DeviceId,
  clock: NanoClock = systemNanoClock,
): Promise<Readonly<MeterRecord>> {
  const data = await client.getMeterRealtimeData(deviceId);
  return toMeterRecord(data, clock());
}
