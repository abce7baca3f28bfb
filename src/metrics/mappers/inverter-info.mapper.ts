import {
  DeviceId,
  FroniusApi,
  FroniusLookupError,
  InverterInfo,
} from '../../fronius';
import { NanoClock, sealRecord, systemNanoClock } from '../metric-record';
import { InverterInfoRecord } from '../metric-series';

/**
 * InverterInfo -> inverter_info
 */
export function toInverterInfoRecord(
  info: InverterInfo,
  time: bigint,
): Readonly<InverterInfoRecord> {
  return sealRecord<InverterInfoRecord>({
    device: 'Inverter',
    deviceType: info.DT,
    pvPower: info.PVPower,
    name: info.CustomName,
    isVisualized: info.Show > 0,
    id: info.UniqueID,
    errorCode: info.ErrorCode,
    statusCode: String(info.StatusCode),
    state: info.InverterState,
    time,
  });
}

/**
 * GetInverterInfo returns every inverter on the bus keyed by id. The queried
 * id must be present and non-null; otherwise the Datamanager and the
 * configured id disagree and no record is produced.
 *
 * @throws FroniusLookupError if the id has no entry
 */
export async function collectInverterInfo(
  client: FroniusApi,
  deviceId: DeviceId,
  clock: NanoClock = systemNanoClock,
): Promise<Readonly<InverterInfoRecord>> {
  const infos = await client.getInverterInfo();
  const info = infos[deviceId.toString()];
  if (!info) {
    throw new FroniusLookupError('GetInverterInfo.cgi', deviceId.toString());
  }
  return toInverterInfoRecord(info, clock());
}
