/**
 * Fronius Solar API v1 Response Schemas
 *
 * Zod schemas for the `Body.Data` payloads the collector consumes. Unknown
 * keys are stripped; the Datamanager adds fields between firmware releases.
 *
 * Optional channels are modelled as `nullish`: the device either omits a
 * channel or reports it as `null` (e.g. P_Akku on sites without storage),
 * and both mean "not reported".
 */
import { z } from 'zod';

// ============================================================================
// Envelope
// ============================================================================
export const FroniusEnvelopeSchema = z.object({
  Head: z.object({
    Status: z.object({
      Code: z.number(),
      Reason: z.string().optional(),
      UserMessage: z.string().optional(),
    }),
  }),
  Body: z.object({ Data: z.unknown() }).optional(),
});

/** `{ "Value": 230.1, "Unit": "V" }` */
const UnitValueSchema = z.object({
  Value: z.number().nullish(),
  Unit: z.string().optional(),
});

const optionalNumber = z.number().nullish();

// ============================================================================
// GetInverterRealtimeData.cgi
// ============================================================================
export const CommonInverterDataSchema = z.object({
  PAC: UnitValueSchema.optional(),
  SAC: UnitValueSchema.optional(),
  IAC: UnitValueSchema.optional(),
  UAC: UnitValueSchema.optional(),
  FAC: UnitValueSchema.optional(),
  IDC: UnitValueSchema.optional(),
  UDC: UnitValueSchema.optional(),
  TOTAL_ENERGY: UnitValueSchema.optional(),
});
export type CommonInverterData = z.infer<typeof CommonInverterDataSchema>;

export const ThreePhaseInverterDataSchema = z.object({
  IAC_L1: UnitValueSchema.optional(),
  IAC_L2: UnitValueSchema.optional(),
  IAC_L3: UnitValueSchema.optional(),
  UAC_L1: UnitValueSchema.optional(),
  UAC_L2: UnitValueSchema.optional(),
  UAC_L3: UnitValueSchema.optional(),
});
export type ThreePhaseInverterData = z.infer<
  typeof ThreePhaseInverterDataSchema
>;

// ============================================================================
// GetInverterInfo.cgi
// ============================================================================
export const InverterInfoSchema = z.object({
  DT: z.number().int(),
  PVPower: z.number().int(),
  CustomName: z.string(),
  Show: z.number().int(),
  UniqueID: z.string(),
  ErrorCode: z.number().int(),
  StatusCode: z.number().int(),
  InverterState: z.string(),
});
export type InverterInfo = z.infer<typeof InverterInfoSchema>;

/** Keyed by device id as a decimal string; offline slots are `null` */
export const InverterInfoMapSchema = z.record(
  z.string(),
  InverterInfoSchema.nullable(),
);
export type InverterInfoMap = z.infer<typeof InverterInfoMapSchema>;

// ============================================================================
// GetMeterRealtimeData.cgi
// ============================================================================
export const MeterRealtimeDataSchema = z.object({
  Current_AC_Phase_1: optionalNumber,
  Current_AC_Phase_2: optionalNumber,
  Current_AC_Phase_3: optionalNumber,
  Current_AC_Sum: optionalNumber,
  Voltage_AC_Phase_1: optionalNumber,
  Voltage_AC_Phase_2: optionalNumber,
  Voltage_AC_Phase_3: optionalNumber,
  Voltage_AC_PhaseToPhase_12: optionalNumber,
  Voltage_AC_PhaseToPhase_23: optionalNumber,
  Voltage_AC_PhaseToPhase_31: optionalNumber,
  PowerReal_P_Phase_1: optionalNumber,
  PowerReal_P_Phase_2: optionalNumber,
  PowerReal_P_Phase_3: optionalNumber,
  PowerReal_P_Sum: z.number(),
  Frequency_Phase_Average: z.number(),
});
export type MeterRealtimeData = z.infer<typeof MeterRealtimeDataSchema>;

// ============================================================================
// GetStorageRealtimeData.cgi
// ============================================================================
export const StorageRealtimeDataSchema = z.object({
  Controller: z.object({
    Enable: z.number(),
    StateOfCharge_Relative: z.number(),
    Capacity_Maximum: z.number(),
    Current_DC: z.number(),
    Voltage_DC: z.number(),
    Temperature_Cell: z.number(),
  }),
});
export type StorageRealtimeData = z.infer<typeof StorageRealtimeDataSchema>;

// ============================================================================
// GetOhmPilotRealtimeData.cgi
// ============================================================================
export const OhmPilotRealtimeDataSchema = z.object({
  CodeOfState: z.number().int(),
  CodeOfError: z.number().int().nullish(),
  PowerReal_PAC_Sum: z.number(),
  Temperature_Channel_1: z.number(),
});
export type OhmPilotRealtimeData = z.infer<typeof OhmPilotRealtimeDataSchema>;

// ============================================================================
// GetPowerFlowRealtimeData.fcgi
// ============================================================================
export const PowerFlowRealtimeDataSchema = z.object({
  Site: z.object({
    P_Akku: optionalNumber,
    P_Grid: optionalNumber,
    P_Load: optionalNumber,
    P_PV: z.number(),
    rel_Autonomy: optionalNumber,
    rel_SelfConsumption: optionalNumber,
  }),
});
export type PowerFlowRealtimeData = z.infer<
  typeof PowerFlowRealtimeDataSchema
>;

// ============================================================================
// Inverter data collections
// ============================================================================

/**
 * A `DataCollection` of GetInverterRealtimeData paired with the schema of
 * its payload.
 */
export interface InverterDataCollection<T> {
  readonly name: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const COMMON_INVERTER_DATA: InverterDataCollection<CommonInverterData> =
  {
    name: 'CommonInverterData',
    schema: CommonInverterDataSchema,
  };

export const THREE_PHASE_INVERTER_DATA: InverterDataCollection<ThreePhaseInverterData> =
  {
    name: '3PInverterData',
    schema: ThreePhaseInverterDataSchema,
  };
