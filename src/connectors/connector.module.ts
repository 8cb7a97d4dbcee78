import { Module } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  SIMULATED_BROKER_TOKEN,
  SIMULATED_ENVIRONMENT_TOKEN,
  SIMULATION_CLOCK_TOKEN,
  SIMULATION_CONFIG_TOKEN,
} from './connector.constants';
import {
  InMemoryBarDataSource,
  ReplayClock,
  SimulatedBroker,
  SimulatedEnvironment,
  SimulatedEnvironmentBuilder,
  SimulatedOrder,
  SystemClock,
} from './simulated';
import { IClock } from '../common/interfaces';
import { EVENT_NAMES, OrderFilledEvent } from '../common/events';
import { SimulationConfigModule } from '../modules/simulation-config/simulation-config.module';
import { SimulationConfigLoaderService } from '../modules/simulation-config/simulation-config-loader.service';
import { SimulationConfig } from '../modules/simulation-config/types';

export function toOrderFilledEvent(order: SimulatedOrder): OrderFilledEvent {
  return new OrderFilledEvent(
    order.orderId,
    order.assetPair.toString(),
    order.side,
    order.type,
    order.averageFillPrice?.toString() ?? '0',
    order.filledQuantity.toString(),
  );
}

@Module({
  imports: [SimulationConfigModule],
  providers: [
    {
      provide: SIMULATION_CONFIG_TOKEN,
      useFactory: (loader: SimulationConfigLoaderService) => loader.load(),
      inject: [SimulationConfigLoaderService],
    },
    {
      provide: SIMULATION_CLOCK_TOKEN,
      useFactory: (config: SimulationConfig): IClock =>
        config.replay
          ? new ReplayClock(config.replay.startTime, config.replay.speed)
          : new SystemClock(),
      inject: [SIMULATION_CONFIG_TOKEN],
    },
    {
      provide: SIMULATED_BROKER_TOKEN,
      useFactory: (config: SimulationConfig, eventEmitter: EventEmitter2) =>
        new SimulatedBroker({
          currency: config.currency,
          notionalAssets: new Set([config.currency, ...config.notionalAssets]),
          startingBalances: config.startingBalances,
          onOrderFilled: (order) => {
            eventEmitter.emit(EVENT_NAMES.ORDER_FILLED, toOrderFilledEvent(order));
          },
        }),
      inject: [SIMULATION_CONFIG_TOKEN, EventEmitter2],
    },
    {
      provide: SIMULATED_ENVIRONMENT_TOKEN,
      useFactory: (
        config: SimulationConfig,
        clock: IClock,
        broker: SimulatedBroker,
      ): SimulatedEnvironment => {
        const builder = new SimulatedEnvironmentBuilder(
          {
            clock,
            barDataSource: InMemoryBarDataSource.fromJson(
              config.bars,
              config.barDurationMs,
            ),
          },
          broker,
        )
          .setBarDuration(config.barDurationMs)
          .setRefreshInterval(config.refreshIntervalMs);
        for (const pair of config.pairs) {
          builder.addPair(pair);
        }
        return builder.build();
      },
      inject: [SIMULATION_CONFIG_TOKEN, SIMULATION_CLOCK_TOKEN, SIMULATED_BROKER_TOKEN],
    },
  ],
  exports: [
    SIMULATION_CONFIG_TOKEN,
    SIMULATED_BROKER_TOKEN,
    SIMULATED_ENVIRONMENT_TOKEN,
  ],
})
export class ConnectorModule {}
