import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CollectorModule } from './collector';
import { validateCollectorEnv } from './config/collector.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateCollectorEnv,
    }),
    CollectorModule,
  ],
})
export class AppModule {}
