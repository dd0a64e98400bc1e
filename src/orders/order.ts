import type {
  AdvancedOptionsPayload,
  GroupOrderPayload,
  GroupOrderType,
  OrderPayload,
  OrderRequest,
  ReplaceOrderPayload,
  ReplaceOrderRequest,
} from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { toProviderTimestamp } from '../utils/time.js';

/**
 * Build the JSON body for a single order.
 * AdvancedOptions is present only when at least one advanced field is set.
 */
export function buildOrderPayload(order: OrderRequest): OrderPayload {
  const payload: OrderPayload = {
    AccountID: order.accountId,
    Symbol: order.symbol,
    Quantity: order.quantity,
    OrderType: order.orderType,
    TradeAction: order.tradeAction,
    TimeInForce: {
      Duration: order.timeInForceDuration,
    },
  };

  if (order.timeInForceExpiration) {
    payload.TimeInForce.Expiration = toProviderTimestamp(order.timeInForceExpiration);
  }
  if (order.route) payload.Route = order.route;
  if (order.limitPrice) payload.LimitPrice = order.limitPrice;
  if (order.stopPrice) payload.StopPrice = order.stopPrice;

  const advanced: AdvancedOptionsPayload = {};
  if (order.addLiquidity !== undefined) advanced.AddLiquidity = order.addLiquidity;
  if (order.allOrNone !== undefined) advanced.AllOrNone = order.allOrNone;
  if (order.bookOnly !== undefined) advanced.BookOnly = order.bookOnly;
  if (order.discretionaryPrice !== undefined) advanced.DiscretionaryPrice = order.discretionaryPrice;
  if (order.marketActivationRules !== undefined) advanced.MarketActivationRules = order.marketActivationRules;
  if (order.nonDisplay !== undefined) advanced.NonDisplay = order.nonDisplay;
  if (order.pegValue !== undefined) advanced.PegValue = order.pegValue;
  if (order.showOnlyQuantity !== undefined) advanced.ShowOnlyQuantity = order.showOnlyQuantity;
  if (order.timeActivationRules !== undefined) advanced.TimeActivationRules = order.timeActivationRules;
  if (order.trailingStop !== undefined) advanced.TrailingStop = order.trailingStop;
  if (order.buyingPowerWarning !== undefined) advanced.BuyingPowerWarning = order.buyingPowerWarning;

  if (Object.keys(advanced).length > 0) {
    payload.AdvancedOptions = advanced;
  }

  if (order.orderConfirmId) payload.OrderConfirmID = order.orderConfirmId;

  return payload;
}

export function buildGroupOrderPayload(type: GroupOrderType, orders: OrderRequest[]): GroupOrderPayload {
  if (orders.length === 0) {
    throw new ConfigurationError('A group order needs at least one order');
  }
  return {
    Type: type,
    Orders: orders.map(buildOrderPayload),
  };
}

/**
 * Build the body for replacing an active order. Only the fields given are sent.
 */
export function buildReplaceOrderPayload(changes: ReplaceOrderRequest): ReplaceOrderPayload {
  if (changes.trailingStopAmount && changes.trailingStopPercent) {
    throw new ConfigurationError('trailingStopAmount and trailingStopPercent are mutually exclusive. Choose one.');
  }

  const payload: ReplaceOrderPayload = {};
  if (changes.quantity) payload.Quantity = changes.quantity;
  if (changes.limitPrice) payload.LimitPrice = changes.limitPrice;
  if (changes.stopPrice) payload.StopPrice = changes.stopPrice;
  if (changes.orderType) payload.OrderType = changes.orderType;

  const advanced: NonNullable<ReplaceOrderPayload['AdvancedOptions']> = {};
  if (changes.showOnlyQuantity) advanced.ShowOnlyQuantity = changes.showOnlyQuantity;

  if (changes.trailingStopAmount) {
    advanced.TrailingStop = { Amount: changes.trailingStopAmount };
  } else if (changes.trailingStopPercent) {
    advanced.TrailingStop = { Percent: changes.trailingStopPercent };
  }

  if (changes.marketActivationClearAll !== undefined || changes.marketActivationRules?.length) {
    advanced.MarketActivationRules = {};
    if (changes.marketActivationClearAll !== undefined) {
      advanced.MarketActivationRules.ClearAll = changes.marketActivationClearAll;
    }
    if (changes.marketActivationRules?.length) {
      advanced.MarketActivationRules.Rules = changes.marketActivationRules;
    }
  }

  if (changes.timeActivationClearAll !== undefined || changes.timeActivationRules?.length) {
    advanced.TimeActivationRules = {};
    if (changes.timeActivationClearAll !== undefined) {
      advanced.TimeActivationRules.ClearAll = changes.timeActivationClearAll;
    }
    if (changes.timeActivationRules?.length) {
      advanced.TimeActivationRules.Rules = changes.timeActivationRules.map((time) => ({
        TimeUtc: toProviderTimestamp(time),
      }));
    }
  }

  if (Object.keys(advanced).length > 0) {
    payload.AdvancedOptions = advanced;
  }

  return payload;
}
