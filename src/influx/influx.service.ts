import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setLogger } from '@influxdata/influxdb-client';
import { SinkConfigurationError } from './influx.errors';
import {
  InfluxConnection,
  InfluxMetricSink,
  MetricSink,
} from './influx-metric.sink';

export interface InfluxDestination extends InfluxConnection {
  bucket: string;
}

const DESTINATION_KEYS = {
  url: 'INFLUX_DB_URL',
  org: 'INFLUX_DB_ORG',
  token: 'INFLUX_DB_TOKEN',
  bucket: 'INFLUX_DB_BUCKET',
} as const;

function clientLogLine(message: string, error?: unknown): string {
  if (error === undefined) {
    return message;
  }
  return `${message} ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * InfluxService
 *
 * Resolves where a cycle's records go and hands out sinks for it. The
 * destination is read from configuration on every call, so a cycle started
 * without INFLUX_DB_* set fails on its own without stopping the collector.
 *
 * The InfluxDB client's own console output goes through a Nest logger
 * instead. Its write errors are demoted to debug, since the collection cycle
 * logs every failed write under the pipeline name.
 */
@Injectable()
export class InfluxService {
  private readonly logger = new Logger(InfluxService.name);
  private readonly clientLogger = new Logger('InfluxDBClient');

  constructor(private readonly configService: ConfigService) {
    setLogger({
      error: (message: string, error?: unknown) =>
        this.clientLogger.debug(clientLogLine(message, error)),
      warn: (message: string, error?: unknown) =>
        this.clientLogger.warn(clientLogLine(message, error)),
    });
  }

  /**
   * @throws SinkConfigurationError naming every unset variable
   */
  resolveDestination(): InfluxDestination {
    const missing: string[] = [];
    const read = (key: string): string => {
      const value = this.configService.get<string>(key);
      if (!value) {
        missing.push(key);
        return '';
      }
      return value;
    };

    const destination: InfluxDestination = {
      url: read(DESTINATION_KEYS.url),
      org: read(DESTINATION_KEYS.org),
      token: read(DESTINATION_KEYS.token),
      bucket: read(DESTINATION_KEYS.bucket),
    };

    if (missing.length > 0) {
      throw new SinkConfigurationError(missing);
    }

    this.logger.debug(
      `Writing to bucket '${destination.bucket}' at ${destination.url} (org ${destination.org})`,
    );
    return destination;
  }

  openSink(connection: InfluxConnection): MetricSink {
    return new InfluxMetricSink(connection);
  }
}
