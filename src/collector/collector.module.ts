import { Module } from '@nestjs/common';
import { FroniusModule } from '../fronius';
import { InfluxModule } from '../influx';
import { CollectionCycleService } from './collection-cycle.service';
import { CollectorScheduler } from './collector.scheduler';

/**
 * CollectorModule
 *
 * Wires the Fronius client and the InfluxDB sink into the collection cycle
 * and starts the scheduler on application bootstrap.
 *
 * Components:
 * - CollectionCycleService: fetch, map and write the seven metrics once
 * - CollectorScheduler: repeats the cycle until shutdown
 */
@Module({
  imports: [FroniusModule, InfluxModule],
  providers: [CollectionCycleService, CollectorScheduler],
  exports: [CollectionCycleService],
})
export class CollectorModule {}
