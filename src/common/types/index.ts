export { AssetPair } from './asset-pair.type';
export type { AssetId } from './asset-pair.type';
export { Amount } from './amount.type';
export { OrderRequests } from './order.type';
export type {
  Order,
  OrderRequest,
  OrderSide,
  OrderStatus,
  OrderType,
} from './order.type';
export type { Account, OpenPosition } from './account.type';
export type { Bar } from './bar.type';
