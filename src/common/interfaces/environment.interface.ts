import { IClient } from './client.interface';
import { IMarket } from './market.interface';

/** A venue that can both trade and serve market data. */
export interface IEnvironment extends IClient, IMarket {}
