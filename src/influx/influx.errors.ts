/**
 * One or more INFLUX_DB_* variables are not set. Raised at the start of a
 * cycle's dispatch; the cycle is abandoned and the scheduler carries on.
 */
export class SinkConfigurationError extends Error {
  constructor(public readonly missing: string[]) {
    super(`Missing InfluxDB configuration: ${missing.join(', ')}`);
    this.name = 'SinkConfigurationError';
  }
}
