import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { SIMULATED_ENVIRONMENT_TOKEN } from '../connectors/connector.constants';
import { SimulatedEnvironment } from '../connectors/simulated';
import { SystemError } from '../common/errors';
import {
  EVENT_NAMES,
  EnvironmentUpdatedEvent,
  EnvironmentUpdateFailedEvent,
} from '../common/events';
import {
  getCorrelationId,
  withCorrelationId,
} from '../common/services/correlation-context';

export const SIMULATION_INTERVAL_NAME = 'simulationUpdate';

/**
 * Initialises the simulated environment at bootstrap and keeps it
 * caught up with its clock every refresh interval.
 */
@Injectable()
export class SimulationSchedulerService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(SimulationSchedulerService.name);

  constructor(
    @Inject(SIMULATED_ENVIRONMENT_TOKEN)
    private readonly environment: SimulatedEnvironment,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  onApplicationBootstrap(): void {
    this.environment.init();
    const intervalMs = this.environment.getRefreshIntervalMs();

    // Registered at runtime: the interval comes from the config file
    const interval = setInterval(() => {
      void this.handleTick();
    }, intervalMs);
    this.schedulerRegistry.addInterval(SIMULATION_INTERVAL_NAME, interval);

    this.logger.log({
      message: 'Simulation started',
      timestamp: new Date().toISOString(),
      module: 'core',
      data: {
        simulatedTime: this.environment.getLastProcessedTime()?.toISOString(),
        refreshIntervalMs: intervalMs,
        trackedPairs: this.trackedPairs(),
      },
    });
  }

  onApplicationShutdown(signal?: string): void {
    if (this.schedulerRegistry.doesExist('interval', SIMULATION_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(SIMULATION_INTERVAL_NAME);
    }
    this.logger.log({
      message: 'Simulation stopped',
      timestamp: new Date().toISOString(),
      module: 'core',
      data: { signal: signal ?? null },
    });
  }

  /**
   * One scheduled catch-up. Failures are logged and reported as events;
   * the interval keeps running.
   */
  async handleTick(): Promise<void> {
    await withCorrelationId(async () => {
      try {
        const simulatedTime = this.environment.update();

        this.logger.debug({
          message: 'Simulation tick processed',
          correlationId: getCorrelationId(),
          timestamp: new Date().toISOString(),
          module: 'core',
          data: { simulatedTime: simulatedTime.toISOString() },
        });
        this.eventEmitter.emit(
          EVENT_NAMES.ENVIRONMENT_UPDATED,
          new EnvironmentUpdatedEvent(simulatedTime, this.trackedPairs()),
        );
      } catch (error) {
        const reason = error instanceof Error ? error.message : 'Unknown error';
        const code = error instanceof SystemError ? error.code : null;

        this.logger.error({
          message: 'Simulation tick failed',
          correlationId: getCorrelationId(),
          timestamp: new Date().toISOString(),
          module: 'core',
          data: { code, error: reason },
        });
        this.eventEmitter.emit(
          EVENT_NAMES.ENVIRONMENT_UPDATE_FAILED,
          new EnvironmentUpdateFailedEvent(code, reason),
        );
      }
    });
  }

  private trackedPairs(): string[] {
    return this.environment.getTrackedPairs().map((pair) => pair.toString());
  }
}
