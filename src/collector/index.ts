// Re-export public API
export { CollectorModule } from './collector.module';
export { CollectionCycleService } from './collection-cycle.service';
export type { CycleReport } from './collection-cycle.service';
export { CollectorScheduler } from './collector.scheduler';
export { buildMetricPipelines } from './metric-pipelines';
export type { MetricPipeline, CollectorDeviceIds } from './metric-pipelines';
