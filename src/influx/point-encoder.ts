import { Point } from '@influxdata/influxdb-client';
import {
  FieldKind,
  MetricRecord,
  MetricSeries,
} from '../metrics/metric-record';

/**
 * Raised when a record value does not fit the kind its series declares.
 */
export class MetricEncodingError extends Error {
  constructor(
    public readonly measurement: string,
    public readonly field: string,
    value: unknown,
  ) {
    super(
      `[${measurement}] Field '${field}' cannot be stored: ${JSON.stringify(value)}`,
    );
    this.name = 'MetricEncodingError';
  }
}

/**
 * Raised when a record carries none of its series' fields. InfluxDB rejects
 * a point without fields, and the client would drop it without a word.
 */
export class EmptyPointError extends Error {
  constructor(public readonly measurement: string) {
    super(`[${measurement}] No fields reported`);
    this.name = 'EmptyPointError';
  }
}

/**
 * Encode a metric record as an InfluxDB point.
 *
 * The record's `device` becomes the only tag, its capture time the point's
 * nanosecond timestamp. Absent optional fields are left out of the point.
 *
 * @throws EmptyPointError if every field of the record is absent
 */
export function toPoint<R extends MetricRecord>(
  series: MetricSeries<R>,
  record: R,
): Point {
  const point = new Point(series.measurement)
    .tag('device', record.device)
    .timestamp(record.time.toString());

  let written = 0;
  for (const field of series.fields) {
    const value: unknown = record[field.key];
    if (value === undefined) {
      continue;
    }
    if (!writeField(point, field.kind, field.name, value)) {
      throw new MetricEncodingError(series.measurement, field.name, value);
    }
    written++;
  }

  if (written === 0) {
    throw new EmptyPointError(series.measurement);
  }
  return point;
}

function writeField(
  point: Point,
  kind: FieldKind,
  name: string,
  value: unknown,
): boolean {
  switch (kind) {
    case 'float':
      if (typeof value !== 'number' || !Number.isFinite(value)) return false;
      point.floatField(name, value);
      return true;
    case 'integer':
      if (typeof value !== 'number' || !Number.isInteger(value)) return false;
      point.intField(name, value);
      return true;
    case 'string':
      if (typeof value !== 'string') return false;
      point.stringField(name, value);
      return true;
    case 'boolean':
      if (typeof value !== 'boolean') return false;
      point.booleanField(name, value);
      return true;
  }
}
