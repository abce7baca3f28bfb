/**
 * Metric Record Building Blocks
 *
 * A metric record is one frozen transcription of a device response: a
 * `device` tag, a fixed set of fields and a nanosecond capture time. The
 * series descriptor next to each record type tells the sink which
 * measurement it belongs to and how each field is stored.
 */

/** Physical role written as the `device` tag */
export type DeviceRole = 'Inverter' | 'Meter' | 'Storage' | 'OhmPilot' | 'Unknown';

export interface MetricRecord {
  readonly device: DeviceRole;
  /** Capture time in nanoseconds since the Unix epoch */
  readonly time: bigint;
}

/** Storage type of a field value in the time-series sink */
export type FieldKind = 'float' | 'integer' | 'string' | 'boolean';

export type MetricFieldKey<R extends MetricRecord> = Exclude<
  keyof R,
  keyof MetricRecord
>;

/**
 * Maps one record property to its stored field name and kind.
 */
export type MetricFieldSpec<R extends MetricRecord> = {
  [K in MetricFieldKey<R>]: {
    readonly key: K;
    readonly name: string;
    readonly kind: FieldKind;
  };
}[MetricFieldKey<R>];

export interface MetricSeries<R extends MetricRecord> {
  readonly measurement: string;
  readonly fields: readonly MetricFieldSpec<R>[];
}

/** Source of capture timestamps; swapped for a fixed clock in tests */
export type NanoClock = () => bigint;

/** Wall clock in nanoseconds, with millisecond resolution */
export const systemNanoClock: NanoClock = () =>
  BigInt(Date.now()) * 1_000_000n;

/**
 * Freeze a freshly mapped record.
 */
export function sealRecord<R extends MetricRecord>(record: R): Readonly<R> {
  return Object.freeze(record);
}
