import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Point } from '@influxdata/influxdb-client';
import { DeviceId, FroniusClient } from '../fronius';
import { InfluxService } from '../influx';
import { buildMetricPipelines, MetricPipeline } from './metric-pipelines';
import { errorMessage } from './error-message';

/**
 * Cycle Result Summary
 */
export interface CycleReport {
  written: string[];
  collectFailed: string[];
  writeFailed: string[];
  durationMs: number;
}

/**
 * CollectionCycleService - one pass over every metric pipeline
 *
 * Responsibilities:
 * 1. Collection: run the seven pipelines one after another; a failing
 *    pipeline is logged and skipped, the rest still run
 * 2. Destination: resolve the InfluxDB destination once per cycle; a missing
 *    setting aborts the cycle and is raised to the caller
 * 3. Dispatch: write each collected point as its own batch, in pipeline
 *    order; a failed write is logged and the next one proceeds
 */
@Injectable()
export class CollectionCycleService {
  private readonly logger = new Logger(CollectionCycleService.name);
  private readonly pipelines: MetricPipeline[];

  constructor(
    private readonly froniusClient: FroniusClient,
    private readonly influxService: InfluxService,
    configService: ConfigService,
  ) {
    this.pipelines = buildMetricPipelines({
      inverter: DeviceId.from(
        configService.get<number>('FRONIUS_INVERTER_ID', 1),
      ),
      meter: DeviceId.from(configService.get<number>('FRONIUS_METER_ID', 0)),
      storage: DeviceId.from(configService.get<number>('FRONIUS_STORAGE_ID', 0)),
      ohmPilot: DeviceId.from(
        configService.get<number>('FRONIUS_OHM_PILOT_ID', 0),
      ),
    });
  }

  /**
   * Run one collection cycle.
   *
   * Per-metric failures never reject; only a cycle-level failure does.
   *
   * @throws SinkConfigurationError if the InfluxDB destination is not configured
   */
  async runCycle(): Promise<CycleReport> {
    const startTime = Date.now();
    const report: CycleReport = {
      written: [],
      collectFailed: [],
      writeFailed: [],
      durationMs: 0,
    };

    const collected: { name: string; point: Point }[] = [];
    for (const pipeline of this.pipelines) {
      try {
        const point = await pipeline.collect(this.froniusClient);
        collected.push({ name: pipeline.name, point });
      } catch (error) {
        report.collectFailed.push(pipeline.name);
        this.logger.error(
          `Failed to collect ${pipeline.name}: ${errorMessage(error)}`,
        );
      }
    }

    const destination = this.influxService.resolveDestination();
    const sink = this.influxService.openSink(destination);

    for (const { name, point } of collected) {
      try {
        await sink.write(destination.bucket, [point]);
        report.written.push(name);
      } catch (error) {
        report.writeFailed.push(name);
        this.logger.error(`Failed to write ${name}: ${errorMessage(error)}`);
      }
    }

    report.durationMs = Date.now() - startTime;
    this.logger.debug(
      `Cycle complete: ${report.written.length}/${this.pipelines.length} metrics written in ${report.durationMs}ms`,
    );
    return report;
  }
}
