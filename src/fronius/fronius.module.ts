import { Module } from '@nestjs/common';
import { FroniusClient } from './fronius.client';

/**
 * FroniusModule
 *
 * Provides the Solar API v1 client. Reads FRONIUS_IP and FRONIUS_TIMEOUT_MS
 * from the global ConfigModule.
 */
@Module({
  providers: [FroniusClient],
  exports: [FroniusClient],
})
export class FroniusModule {}
