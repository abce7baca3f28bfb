// Re-export public API
export { FroniusModule } from './fronius.module';
export { FroniusClient } from './fronius.client';
export type { FroniusApi } from './fronius.client';
export { DeviceId } from './device-id';
export {
  FroniusError,
  FroniusTransportError,
  FroniusDecodeError,
  FroniusProtocolError,
  FroniusLookupError,
} from './fronius.errors';
export {
  COMMON_INVERTER_DATA,
  THREE_PHASE_INVERTER_DATA,
} from './dto/fronius-responses';
export type {
  CommonInverterData,
  ThreePhaseInverterData,
  InverterDataCollection,
  InverterInfo,
  InverterInfoMap,
  MeterRealtimeData,
  StorageRealtimeData,
  OhmPilotRealtimeData,
  PowerFlowRealtimeData,
} from './dto/fronius-responses';
