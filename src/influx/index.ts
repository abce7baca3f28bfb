// Re-export public API
export { InfluxModule } from './influx.module';
export { InfluxService } from './influx.service';
export type { InfluxDestination } from './influx.service';
export { InfluxMetricSink } from './influx-metric.sink';
export type { InfluxConnection, MetricSink } from './influx-metric.sink';
export { SinkConfigurationError } from './influx.errors';
export { toPoint, MetricEncodingError, EmptyPointError } from './point-encoder';
