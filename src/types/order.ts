// Order placement types

// ============================================================================
// Caller-side Types
// ============================================================================

export type OrderType = 'Limit' | 'StopMarket' | 'Market' | 'StopLimit';

export type TradeAction =
  | 'BUY'
  | 'SELL'
  | 'BUYTOCOVER'
  | 'SELLSHORT'
  | 'BUYTOOPEN'
  | 'BUYTOCLOSE'
  | 'SELLTOOPEN'
  | 'SELLTOCLOSE';

export type TimeInForceDuration =
  | 'DAY' | 'DYP' | 'GTC' | 'GCP' | 'GTD' | 'GDP' | 'OPG' | 'CLO' | 'IOC' | 'FOK' | '1' | '3' | '5';

export type GroupOrderType = 'BRK' | 'OCO' | 'NORMAL';

export interface TrailingStop {
  Amount?: string;
  Percent?: string;
}

export type ActivationRule = Record<string, unknown>;

export interface OrderRequest {
  accountId: string;
  symbol: string;
  quantity: string;
  orderType: OrderType;
  tradeAction: TradeAction;
  timeInForceDuration: TimeInForceDuration;
  /** Required by the provider for GTD and GDP orders */
  timeInForceExpiration?: Date;
  route?: string;
  limitPrice?: string;
  stopPrice?: string;
  addLiquidity?: boolean;
  allOrNone?: boolean;
  bookOnly?: boolean;
  discretionaryPrice?: string;
  marketActivationRules?: ActivationRule[];
  nonDisplay?: boolean;
  pegValue?: string;
  showOnlyQuantity?: string;
  timeActivationRules?: ActivationRule[];
  trailingStop?: TrailingStop;
  buyingPowerWarning?: string;
  orderConfirmId?: string;
}

export interface ReplaceOrderRequest {
  quantity?: string;
  limitPrice?: string;
  stopPrice?: string;
  orderType?: 'Market';
  showOnlyQuantity?: string;
  trailingStopAmount?: string;
  trailingStopPercent?: string;
  marketActivationClearAll?: boolean;
  marketActivationRules?: ActivationRule[];
  timeActivationClearAll?: boolean;
  timeActivationRules?: Date[];
}

// ============================================================================
// Wire Types
// ============================================================================

export interface AdvancedOptionsPayload {
  AddLiquidity?: boolean;
  AllOrNone?: boolean;
  BookOnly?: boolean;
  DiscretionaryPrice?: string;
  MarketActivationRules?: ActivationRule[];
  NonDisplay?: boolean;
  PegValue?: string;
  ShowOnlyQuantity?: string;
  TimeActivationRules?: ActivationRule[];
  TrailingStop?: TrailingStop;
  BuyingPowerWarning?: string;
}

export interface OrderPayload {
  AccountID: string;
  Symbol: string;
  Quantity: string;
  OrderType: OrderType;
  TradeAction: TradeAction;
  TimeInForce: {
    Duration: TimeInForceDuration;
    Expiration?: string;
  };
  Route?: string;
  LimitPrice?: string;
  StopPrice?: string;
  AdvancedOptions?: AdvancedOptionsPayload;
  OrderConfirmID?: string;
}

export interface GroupOrderPayload {
  Type: GroupOrderType;
  Orders: OrderPayload[];
}

export interface ActivationRuleSet<T> {
  ClearAll?: boolean;
  Rules?: T[];
}

export interface ReplaceOrderPayload {
  Quantity?: string;
  LimitPrice?: string;
  StopPrice?: string;
  OrderType?: 'Market';
  AdvancedOptions?: {
    ShowOnlyQuantity?: string;
    TrailingStop?: TrailingStop;
    MarketActivationRules?: ActivationRuleSet<ActivationRule>;
    TimeActivationRules?: ActivationRuleSet<{ TimeUtc: string }>;
  };
}
