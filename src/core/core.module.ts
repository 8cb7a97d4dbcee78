import { Module } from '@nestjs/common';
import { ConnectorModule } from '../connectors/connector.module';
import { SimulationSchedulerService } from './simulation-scheduler.service';
import { OrderEventLoggerService } from './order-event-logger.service';

/**
 * Core module: drives the simulation clock and logs its events.
 */
@Module({
  imports: [ConnectorModule],
  providers: [SimulationSchedulerService, OrderEventLoggerService],
})
export class CoreModule {}
