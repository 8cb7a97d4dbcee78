export type { IClient } from './client.interface';
export type { IMarket } from './market.interface';
export type { IEnvironment } from './environment.interface';
export type { IClock } from './clock.interface';
export type { IBarDataSource } from './bar-data-source.interface';
