import { describe, it, expect } from 'vitest';
import { buildGroupOrderPayload, buildOrderPayload, buildReplaceOrderPayload } from '../src/orders/order.js';
import { ConfigurationError } from '../src/errors/index.js';
import type { OrderRequest } from '../src/types/index.js';

const limitOrder: OrderRequest = {
  accountId: '123456',
  symbol: 'MSFT',
  quantity: '10',
  orderType: 'Limit',
  tradeAction: 'BUY',
  timeInForceDuration: 'DAY',
  limitPrice: '400.50',
};

describe('buildOrderPayload', () => {
  it('should send only the required keys for a required-only order', () => {
    const payload = buildOrderPayload({
      accountId: '123456',
      symbol: 'MSFT',
      quantity: '10',
      orderType: 'Market',
      tradeAction: 'BUY',
      timeInForceDuration: 'DAY',
    });

    expect(payload).toEqual({
      AccountID: '123456',
      Symbol: 'MSFT',
      Quantity: '10',
      OrderType: 'Market',
      TradeAction: 'BUY',
      TimeInForce: { Duration: 'DAY' },
    });
    expect(Object.keys(payload)).toEqual(['AccountID', 'Symbol', 'Quantity', 'OrderType', 'TradeAction', 'TimeInForce']);
  });

  it('should add AdvancedOptions with exactly the advanced field given', () => {
    const payload = buildOrderPayload({ ...limitOrder, pegValue: 'BEST' });

    expect(payload.AdvancedOptions).toEqual({ PegValue: 'BEST' });
    expect(payload.LimitPrice).toBe('400.50');
  });

  it('should keep false advanced flags', () => {
    const payload = buildOrderPayload({ ...limitOrder, allOrNone: false });

    expect(payload.AdvancedOptions).toEqual({ AllOrNone: false });
  });

  it('should map every advanced field to its wire name', () => {
    const payload = buildOrderPayload({
      ...limitOrder,
      addLiquidity: true,
      bookOnly: true,
      discretionaryPrice: '0.05',
      nonDisplay: true,
      showOnlyQuantity: '5',
      trailingStop: { Percent: '2' },
      buyingPowerWarning: 'Confirmed',
      marketActivationRules: [{ RuleType: 'Price', Symbol: 'MSFT', Predicate: 'Gt', Price: '401' }],
      timeActivationRules: [{ TimeUtc: '2024-03-01T14:30:00Z' }],
    });

    expect(payload.AdvancedOptions).toEqual({
      AddLiquidity: true,
      BookOnly: true,
      DiscretionaryPrice: '0.05',
      NonDisplay: true,
      ShowOnlyQuantity: '5',
      TrailingStop: { Percent: '2' },
      BuyingPowerWarning: 'Confirmed',
      MarketActivationRules: [{ RuleType: 'Price', Symbol: 'MSFT', Predicate: 'Gt', Price: '401' }],
      TimeActivationRules: [{ TimeUtc: '2024-03-01T14:30:00Z' }],
    });
  });

  it('should format the expiration as a whole-second UTC timestamp', () => {
    const payload = buildOrderPayload({
      ...limitOrder,
      timeInForceDuration: 'GTD',
      timeInForceExpiration: new Date(Date.UTC(2024, 2, 1, 14, 30, 0, 250)),
    });

    expect(payload.TimeInForce).toEqual({ Duration: 'GTD', Expiration: '2024-03-01T14:30:00Z' });
  });

  it('should carry route, stop price and confirm id when given', () => {
    const payload = buildOrderPayload({
      ...limitOrder,
      orderType: 'StopLimit',
      stopPrice: '399.00',
      route: 'Intelligent',
      orderConfirmId: 'confirm-1',
    });

    expect(payload.Route).toBe('Intelligent');
    expect(payload.StopPrice).toBe('399.00');
    expect(payload.OrderConfirmID).toBe('confirm-1');
    expect(payload.AdvancedOptions).toBeUndefined();
  });

  it('should reject an invalid expiration date', () => {
    expect(() => buildOrderPayload({ ...limitOrder, timeInForceExpiration: new Date('not a date') })).toThrow(
      ConfigurationError
    );
  });
});

describe('buildGroupOrderPayload', () => {
  it('should wrap each order payload under the group type', () => {
    const stop: OrderRequest = { ...limitOrder, orderType: 'StopMarket', tradeAction: 'SELL', stopPrice: '390' };
    delete stop.limitPrice;

    const payload = buildGroupOrderPayload('OCO', [limitOrder, stop]);

    expect(payload.Type).toBe('OCO');
    expect(payload.Orders).toHaveLength(2);
    expect(payload.Orders[1]).toEqual({
      AccountID: '123456',
      Symbol: 'MSFT',
      Quantity: '10',
      OrderType: 'StopMarket',
      TradeAction: 'SELL',
      TimeInForce: { Duration: 'DAY' },
      StopPrice: '390',
    });
  });

  it('should reject an empty group', () => {
    expect(() => buildGroupOrderPayload('BRK', [])).toThrow(ConfigurationError);
  });
});

describe('buildReplaceOrderPayload', () => {
  it('should send only the fields that change', () => {
    expect(buildReplaceOrderPayload({ quantity: '20', limitPrice: '401' })).toEqual({
      Quantity: '20',
      LimitPrice: '401',
    });
    expect(buildReplaceOrderPayload({})).toEqual({});
  });

  it('should convert to a market order', () => {
    expect(buildReplaceOrderPayload({ orderType: 'Market' })).toEqual({ OrderType: 'Market' });
  });

  it('should build a trailing stop from an amount or a percent', () => {
    expect(buildReplaceOrderPayload({ trailingStopAmount: '1.5' })).toEqual({
      AdvancedOptions: { TrailingStop: { Amount: '1.5' } },
    });
    expect(buildReplaceOrderPayload({ trailingStopPercent: '3' })).toEqual({
      AdvancedOptions: { TrailingStop: { Percent: '3' } },
    });
  });

  it('should reject amount and percent together', () => {
    expect(() => buildReplaceOrderPayload({ trailingStopAmount: '1', trailingStopPercent: '2' })).toThrow(
      'trailingStopAmount and trailingStopPercent are mutually exclusive. Choose one.'
    );
  });

  it('should build activation rule sets', () => {
    const payload = buildReplaceOrderPayload({
      showOnlyQuantity: '5',
      marketActivationClearAll: true,
      timeActivationRules: [new Date(Date.UTC(2024, 2, 1, 15, 0, 0))],
    });

    expect(payload).toEqual({
      AdvancedOptions: {
        ShowOnlyQuantity: '5',
        MarketActivationRules: { ClearAll: true },
        TimeActivationRules: { Rules: [{ TimeUtc: '2024-03-01T15:00:00Z' }] },
      },
    });
  });
});
