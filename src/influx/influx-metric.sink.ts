import { InfluxDB, Point } from '@influxdata/influxdb-client';

export interface InfluxConnection {
  url: string;
  org: string;
  token: string;
}

/**
 * Destination of a batch of points.
 */
export interface MetricSink {
  write(bucket: string, points: Point[]): Promise<void>;
}

/**
 * MetricSink backed by the InfluxDB 2 write API.
 *
 * Each `write` opens its own write API with nanosecond precision and no
 * client-side retries, and resolves once the batch has been flushed.
 */
export class InfluxMetricSink implements MetricSink {
  private readonly influx: InfluxDB;

  constructor(private readonly connection: InfluxConnection) {
    this.influx = new InfluxDB({
      url: connection.url,
      token: connection.token,
    });
  }

  async write(bucket: string, points: Point[]): Promise<void> {
    const writeApi = this.influx.getWriteApi(
      this.connection.org,
      bucket,
      'ns',
      {
        batchSize: points.length + 1,
        flushInterval: 0,
        maxRetries: 0,
      },
    );
    writeApi.writePoints(points);
    await writeApi.close();
  }
}
