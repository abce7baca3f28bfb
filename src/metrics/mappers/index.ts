export { collectInverterData, toInverterRecord } from './inverter.mapper';
export {
  collectInverterPhaseData,
  toInverterPhaseRecord,
} from './inverter-phase.mapper';
export {
  collectInverterInfo,
  toInverterInfoRecord,
} from './inverter-info.mapper';
export { collectMeterData, toMeterRecord } from './meter.mapper';
export { collectStorageData, toStorageRecord } from './storage.mapper';
export { collectOhmPilotData, toOhmPilotRecord } from './ohm-pilot.mapper';
export { collectPowerFlowData, toPowerFlowRecord } from './power-flow.mapper';
