import { Point } from '@influxdata/influxdb-client';
import { DeviceId, FroniusApi } from '../fronius';
import { toPoint } from '../influx';
import {
  MetricRecord,
  MetricSeries,
  NanoClock,
  systemNanoClock,
} from '../metrics/metric-record';
import {
  INVERTER_INFO_SERIES,
  INVERTER_PHASE_SERIES,
  INVERTER_SERIES,
  METER_SERIES,
  OHM_PILOT_SERIES,
  POWER_FLOW_SERIES,
  STORAGE_SERIES,
} from '../metrics/metric-series';
import {
  collectInverterData,
  collectInverterInfo,
  collectInverterPhaseData,
  collectMeterData,
  collectOhmPilotData,
  collectPowerFlowData,
  collectStorageData,
} from '../metrics/mappers';

/**
 * One fetch -> map -> encode chain, named after the data it collects
 * (`meter_data`, `power_flow_data`, ...). The name is what shows up in
 * failure logs.
 */
export interface MetricPipeline {
  readonly name: string;
  collect(client: FroniusApi): Promise<Point>;
}

export interface CollectorDeviceIds {
  inverter: DeviceId;
  meter: DeviceId;
  storage: DeviceId;
  ohmPilot: DeviceId;
}

export function definePipeline<R extends MetricRecord>(
  name: string,
  series: MetricSeries<R>,
  collect: (client: FroniusApi) => Promise<R>,
): MetricPipeline {
  return {
    name,
    async collect(client: FroniusApi): Promise<Point> {
      return toPoint(series, await collect(client));
    },
  };
}

/**
 * The seven pipelines of a collection cycle, in dispatch order.
 */
export function buildMetricPipelines(
  ids: CollectorDeviceIds,
  clock: NanoClock = systemNanoClock,
): MetricPipeline[] {
  return [
    definePipeline('inverter_data', INVERTER_SERIES, (client) =>
      collectInverterData(client, ids.inverter, clock),
    ),
    definePipeline('inverter_phase_data', INVERTER_PHASE_SERIES, (client) =>
      collectInverterPhaseData(client, ids.inverter, clock),
    ),
    definePipeline('inverter_info', INVERTER_INFO_SERIES, (client) =>
      collectInverterInfo(client, ids.inverter, clock),
    ),
    definePipeline('meter_data', METER_SERIES, (client) =>
      collectMeterData(client, ids.meter, clock),
    ),
    definePipeline('storage_data', STORAGE_SERIES, (client) =>
      collectStorageData(client, ids.storage, clock),
    ),
    definePipeline('ohm_pilot_data', OHM_PILOT_SERIES, (client) =>
      collectOhmPilotData(client, ids.ohmPilot, clock),
    ),
    definePipeline('power_flow_data', POWER_FLOW_SERIES, (client) =>
      collectPowerFlowData(client, clock),
    ),
  ];
}
