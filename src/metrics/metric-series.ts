import { MetricRecord, MetricSeries } from './metric-record';

// ============================================================================
// inverter
// ============================================================================
export interface InverterRecord extends MetricRecord {
  readonly device: 'Inverter';
  readonly acPower?: number;
  readonly acPowerAbs?: number;
  readonly acCurrent?: number;
  readonly acVoltage?: number;
  readonly acFrequency?: number;
  readonly dcCurrent?: number;
  readonly dcVoltage?: number;
  readonly totalEnergy?: number;
}

export const INVERTER_SERIES: MetricSeries<InverterRecord> = {
  measurement: 'inverter',
  fields: [
    { key: 'acPower', name: 'ac_power', kind: 'float' },
    { key: 'acPowerAbs', name: 'ac_power_abs', kind: 'float' },
    { key: 'acCurrent', name: 'ac_current', kind: 'float' },
    { key: 'acVoltage', name: 'ac_voltage', kind: 'float' },
    { key: 'acFrequency', name: 'ac_frequency', kind: 'float' },
    { key: 'dcCurrent', name: 'dc_current', kind: 'float' },
    { key: 'dcVoltage', name: 'dc_voltage', kind: 'float' },
    { key: 'totalEnergy', name: 'total_energy', kind: 'float' },
  ],
};

// ============================================================================
// inverter_phase
// ============================================================================

// The phase voltages are AC readings; the dc_ prefix is kept so existing
// dashboards keep resolving the stored field names.
export interface InverterPhaseRecord extends MetricRecord {
  readonly device: 'Inverter';
  readonly acL1Current?: number;
  readonly acL2Current?: number;
  readonly acL3Current?: number;
  readonly l1Voltage?: number;
  readonly l2Voltage?: number;
  readonly l3Voltage?: number;
}

export const INVERTER_PHASE_SERIES: MetricSeries<InverterPhaseRecord> = {
  measurement: 'inverter_phase',
  fields: [
    { key: 'acL1Current', name: 'ac_l1_current', kind: 'float' },
    { key: 'acL2Current', name: 'ac_l2_current', kind: 'float' },
    { key: 'acL3Current', name: 'ac_l3_current', kind: 'float' },
    { key: 'l1Voltage', name: 'dc_l1_voltage', kind: 'float' },
    { key: 'l2Voltage', name: 'dc_l2_voltage', kind: 'float' },
    { key: 'l3Voltage', name: 'dc_l3_voltage', kind: 'float' },
  ],
};

// ============================================================================
// inverter_info
// ============================================================================
export interface InverterInfoRecord extends MetricRecord {
  readonly device: 'Inverter';
  readonly deviceType: number;
  readonly pvPower: number;
  readonly name: string;
  readonly isVisualized: boolean;
  readonly id: string;
  readonly errorCode: number;
  readonly statusCode: string;
  readonly state: string;
}

export const INVERTER_INFO_SERIES: MetricSeries<InverterInfoRecord> = {
  measurement: 'inverter_info',
  fields: [
    { key: 'deviceType', name: 'device_type', kind: 'integer' },
    { key: 'pvPower', name: 'pv_power', kind: 'integer' },
    { key: 'name', name: 'name', kind: 'string' },
    { key: 'isVisualized', name: 'is_visualized', kind: 'boolean' },
    { key: 'id', name: 'id', kind: 'string' },
    { key: 'errorCode', name: 'error_code', kind: 'integer' },
    { key: 'statusCode', name: 'status_code', kind: 'string' },
    { key: 'state', name: 'state', kind: 'string' },
  ],
};

// ============================================================================
// meter
// ============================================================================
export interface MeterRecord extends MetricRecord {
  readonly device: 'Meter';
  readonly l1Current?: number;
  readonly l2Current?: number;
  readonly l3Current?: number;
  readonly current?: number;
  readonly l1Voltage?: number;
  readonly l2Voltage?: number;
  readonly l3Voltage?: number;
  readonly l12Voltage?: number;
  readonly l23Voltage?: number;
  readonly l31Voltage?: number;
  readonly l1Power?: number;
  readonly l2Power?: number;
  readonly l3Power?: number;
  readonly power: number;
  readonly frequencyAverage: number;
}

export const METER_SERIES: MetricSeries<MeterRecord> = {
  measurement: 'meter',
  fields: [
    { key: 'l1Current', name: 'l1_current', kind: 'float' },
    { key: 'l2Current', name: 'l2_current', kind: 'float' },
    { key: 'l3Current', name: 'l3_current', kind: 'float' },
    { key: 'current', name: 'current', kind: 'float' },
    { key: 'l1Voltage', name: 'l1_voltage', kind: 'float' },
    { key: 'l2Voltage', name: 'l2_voltage', kind: 'float' },
    { key: 'l3Voltage', name: 'l3_voltage', kind: 'float' },
    { key: 'l12Voltage', name: 'l12_voltage', kind: 'float' },
    { key: 'l23Voltage', name: 'l23_voltage', kind: 'float' },
    { key: 'l31Voltage', name: 'l31_voltage', kind: 'float' },
    { key: 'l1Power', name: 'l1_power', kind: 'float' },
    { key: 'l2Power', name: 'l2_power', kind: 'float' },
    { key: 'l3Power', name: 'l3_power', kind: 'float' },
    { key: 'power', name: 'power', kind: 'float' },
    { key: 'frequencyAverage', name: 'frequency_average', kind: 'float' },
  ],
};

// ============================================================================
// storage
// ============================================================================
export interface StorageRecord extends MetricRecord {
  readonly device: 'Storage';
  readonly enabled: boolean;
  readonly chargePercentage: number;
  readonly capacity: number;
  readonly dcCurrent: number;
  readonly dcVoltage: number;
  readonly temperatureCell: number;
}

export const STORAGE_SERIES: MetricSeries<StorageRecord> = {
  measurement: 'storage',
  fields: [
    { key: 'enabled', name: 'enabled', kind: 'boolean' },
    { key: 'chargePercentage', name: 'charge_percentage', kind: 'float' },
    { key: 'capacity', name: 'capacity', kind: 'float' },
    { key: 'dcCurrent', name: 'dc_current', kind: 'float' },
    { key: 'dcVoltage', name: 'dc_voltage', kind: 'float' },
    { key: 'temperatureCell', name: 'temperature_cell', kind: 'float' },
  ],
};

// ============================================================================
// ohm_pilot
// ============================================================================
export interface OhmPilotRecord extends MetricRecord {
  readonly device: 'OhmPilot';
  readonly state: string;
  readonly errorCode: number;
  readonly power: number;
  readonly temperature: number;
}

export const OHM_PILOT_SERIES: MetricSeries<OhmPilotRecord> = {
  measurement: 'ohm_pilot',
  fields: [
    { key: 'state', name: 'state', kind: 'string' },
    { key: 'errorCode', name: 'error_code', kind: 'integer' },
    { key: 'power', name: 'power', kind: 'float' },
    { key: 'temperature', name: 'temperature', kind: 'float' },
  ],
};

// ============================================================================
// power_flow
// ============================================================================

/** Site-wide summary, not bound to one device */
export interface PowerFlowRecord extends MetricRecord {
  readonly device: 'Unknown';
  readonly akku?: number;
  readonly grid?: number;
  readonly load?: number;
  readonly photovoltaik: number;
  readonly relativeAutonomy?: number;
  readonly relativeSelfConsumption?: number;
}

export const POWER_FLOW_SERIES: MetricSeries<PowerFlowRecord> = {
  measurement: 'power_flow',
  fields: [
    { key: 'akku', name: 'akku', kind: 'float' },
    { key: 'grid', name: 'grid', kind: 'float' },
    { key: 'load', name: 'load', kind: 'float' },
    { key: 'photovoltaik', name: 'photovoltaik', kind: 'float' },
    { key: 'relativeAutonomy', name: 'relative_autonomy', kind: 'float' },
    {
      key: 'relativeSelfConsumption',
      name: 'relative_self_consumption',
      kind: 'float',
    },
  ],
};
