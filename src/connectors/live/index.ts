export { HttpBarMarket } from './http-bar-market';
export type { HttpBarMarketOptions } from './http-bar-market';
export { LiveEnvironment } from './live-environment';
