export { Ledger } from './ledger';
export type { LedgerSnapshot } from './ledger';
export { SimulatedBroker, SimulatedBrokerBuilder } from './simulated-broker';
export { SimulatedClient } from './simulated-client';
export {
  SimulatedEnvironment,
  SimulatedEnvironmentBuilder,
} from './simulated-environment';
export type {
  SimulatedContext,
  SimulatedEnvironmentOptions,
} from './simulated-environment';
export { ManualClock, ReplayClock, SystemClock } from './clock';
export { InMemoryBarDataSource } from './in-memory-bar-data-source';
export type { BarFixture, BarRecord } from './in-memory-bar-data-source';
export {
  DEFAULT_BAR_DURATION_MS,
  DEFAULT_REFRESH_INTERVAL_MS,
} from './simulated.types';
export type {
  OrderFilledListener,
  SimulatedBrokerConfig,
  SimulatedOrder,
} from './simulated.types';
