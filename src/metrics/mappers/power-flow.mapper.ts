import { FroniusApi, PowerFlowRealtimeData } from '../../fronius';
import { NanoClock, sealRecord, systemNanoClock } from '../metric-record';
import { PowerFlowRecord } from '../metric-series';

/**
 * PowerFlowRealtimeData -> power_flow (Site fields hoisted to the top)
 */
export function toPowerFlowRecord(
  data: PowerFlowRealtimeData,
  time: bigint,
): Readonly<PowerFlowRecord> {
  const { Site: site } = data;
  return sealRecord<PowerFlowRecord>({
    device: 'Unknown',
    akku: site.P_Akku ?? undefined,
    grid: site.P_Grid ?? undefined,
    load: site.P_Load ?? undefined,
    photovoltaik: site.P_PV,
    relativeAutonomy: site.rel_Autonomy ?? undefined,
    relativeSelfConsumption: site.rel_SelfConsumption ?? undefined,
    time,
  });
}

export async function collectPowerFlowData(
  client: FroniusApi,
  clock: NanoClock = systemNanoClock,
): Promise<Readonly<PowerFlowRecord>> {
  const data = await client.getPowerFlowRealtimeData();
  return toPowerFlowRecord(data, clock());
}
