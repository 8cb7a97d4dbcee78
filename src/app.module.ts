import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { LoggerModule } from 'nestjs-pino';
import { ConnectorModule } from './connectors/connector.module';
import { CoreModule } from './core/core.module';
import { SimulationConfigModule } from './modules/simulation-config/simulation-config.module';
import { loggerConfig } from './common/config/logger.config';

@Module({
  imports: [
    // CRITICAL: LoggerModule MUST be first to replace default logger early
    LoggerModule.forRoot(loggerConfig),

    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env.${process.env.NODE_ENV || 'development'}`,
    }),
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
    }),
    ScheduleModule.forRoot(), // Interval for SimulationSchedulerService
    SimulationConfigModule,
    ConnectorModule,
    CoreModule,
  ],
})
export class AppModule {}
