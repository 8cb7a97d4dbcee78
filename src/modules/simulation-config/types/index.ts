export type { ReplaySettings, SimulationConfig } from './simulation-config.type';
