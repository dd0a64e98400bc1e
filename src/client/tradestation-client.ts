import { resolveClientConfig } from '../config/loader.js';
import type {
  Bar,
  BarsQuery,
  BarsResponse,
  ClientConfig,
  ClientOptions,
  GroupOrderType,
  IdList,
  JsonObject,
  OrderRequest,
  ReplaceOrderRequest,
  StreamBarsQuery,
  StreamMessage,
  StreamPositionsQuery,
  TokenState,
} from '../types/index.js';
import { InMemoryTokenStore } from '../auth/token-store.js';
import { AuthManager } from '../auth/auth-manager.js';
import { RequestDispatcher } from './request-dispatcher.js';
import { buildBarsParams, buildPositionsParams, buildStreamBarsParams, joinIds } from './params.js';
import { buildGroupOrderPayload, buildOrderPayload, buildReplaceOrderPayload } from '../orders/order.js';
import logger from '../config/logger.js';

/**
 * Client for the brokerage REST and streaming API.
 *
 * Instances only come from {@link TradeStationClient.create}, which does not
 * resolve until the user has completed the browser login.
 */
export class TradeStationClient {
  readonly config: ClientConfig;
  readonly authManager: AuthManager;
  readonly dispatcher: RequestDispatcher;
  private tokenStore: InMemoryTokenStore;

  private constructor(config: ClientConfig) {
    this.config = config;
    this.tokenStore = new InMemoryTokenStore();
    this.authManager = new AuthManager(this.tokenStore, config);
    this.dispatcher = new RequestDispatcher(config.apiUrl, this.tokenStore, config.requestTimeoutMs);
  }

  /**
   * Resolve configuration, run the browser login and, unless disabled,
   * start refreshing the token in the background.
   */
  static async create(options: ClientOptions = {}): Promise<TradeStationClient> {
    const config = resolveClientConfig(options);
    const client = new TradeStationClient(config);

    logger.info({ apiUrl: config.apiUrl, demo: config.demo }, 'Authenticating');
    await client.authManager.authenticate();

    if (config.autoRefresh) {
      client.authManager.startRefreshLoop();
    }
    return client;
  }

  getTokenState(): Readonly<TokenState> {
    return this.tokenStore.snapshot();
  }

  /**
   * Stop background work. Open streams are closed by their consumers.
   */
  close(): void {
    this.authManager.stopRefreshLoop();
  }

  // ==========================================================================
  // Market Data
  // ==========================================================================

  async getBars(symbol: string, query: BarsQuery = {}): Promise<Bar[]> {
    const params = buildBarsParams(query);
    const response = await this.dispatcher.request<BarsResponse>({
      endpoint: `marketdata/barcharts/${encodeURIComponent(symbol)}`,
      params,
    });
    return response.Bars ?? [];
  }

  streamBars(symbol: string, query: StreamBarsQuery = {}): AsyncGenerator<StreamMessage> {
    const params = buildStreamBarsParams(query);
    return this.dispatcher.stream({
      endpoint: `marketdata/stream/barcharts/${encodeURIComponent(symbol)}`,
      params,
    });
  }

  // ==========================================================================
  // Brokerage
  // ==========================================================================

  async getAccounts(): Promise<JsonObject> {
    return this.dispatcher.request({ endpoint: 'brokerage/accounts' });
  }

  async getBalances(accounts: IdList): Promise<JsonObject> {
    return this.dispatcher.request({ endpoint: `brokerage/accounts/${joinIds(accounts)}/balances` });
  }

  /**
   * Today's and open orders, newest first
   */
  async getOrders(accounts: IdList): Promise<JsonObject> {
    return this.dispatcher.request({ endpoint: `brokerage/accounts/${joinIds(accounts)}/orders` });
  }

  async getOrdersById(accounts: IdList, orderIds: IdList): Promise<JsonObject> {
    return this.dispatcher.request({
      endpoint: `brokerage/accounts/${joinIds(accounts)}/orders/${joinIds(orderIds)}`,
    });
  }

  async getPositions(accounts: IdList, symbols?: IdList): Promise<JsonObject> {
    return this.dispatcher.request({
      endpoint: `brokerage/accounts/${joinIds(accounts)}/positions`,
      params: buildPositionsParams(symbols),
    });
  }

  streamPositions(accounts: IdList, query: StreamPositionsQuery = {}): AsyncGenerator<StreamMessage> {
    const endpoint = `brokerage/stream/accounts/${joinIds(accounts)}/positions`;
    return this.dispatcher.stream({
      endpoint,
      params: { changes: String(query.changes ?? false) },
    });
  }

  streamOrders(accounts: IdList): AsyncGenerator<StreamMessage> {
    return this.dispatcher.stream({ endpoint: `brokerage/stream/accounts/${joinIds(accounts)}/orders` });
  }

  streamOrdersById(accounts: IdList, orderIds: IdList): AsyncGenerator<StreamMessage> {
    return this.dispatcher.stream({
      endpoint: `brokerage/stream/accounts/${joinIds(accounts)}/orders/${joinIds(orderIds)}`,
    });
  }

  // ==========================================================================
  // Order Execution
  // ==========================================================================

  async placeOrder(order: OrderRequest): Promise<JsonObject> {
    return this.dispatcher.request({
      method: 'POST',
      endpoint: 'brokerage/accounts/orders',
      payload: buildOrderPayload(order),
    });
  }

  async placeGroupOrder(type: GroupOrderType, orders: OrderRequest[]): Promise<JsonObject> {
    return this.dispatcher.request({
      method: 'POST',
      endpoint: 'brokerage/accounts/ordergroups',
      payload: buildGroupOrderPayload(type, orders),
    });
  }

  /**
   * Estimated cost and commission for an order, without placing it
   */
  async confirmOrder(order: OrderRequest): Promise<JsonObject> {
    return this.dispatcher.request({
      method: 'POST',
      endpoint: 'brokerage/accounts/orderconfirm',
      payload: buildOrderPayload(order),
    });
  }

  async confirmGroupOrder(type: GroupOrderType, orders: OrderRequest[]): Promise<JsonObject> {
    return this.dispatcher.request({
      method: 'POST',
      endpoint: 'brokerage/accounts/ordergroupconfirm',
      payload: buildGroupOrderPayload(type, orders),
    });
  }

  async replaceOrder(orderId: string, changes: ReplaceOrderRequest): Promise<JsonObject> {
    return this.dispatcher.request({
      method: 'PUT',
      endpoint: `brokerage/accounts/orders/${encodeURIComponent(orderId)}`,
      payload: buildReplaceOrderPayload(changes),
    });
  }

  async cancelOrder(orderId: string): Promise<JsonObject> {
    return this.dispatcher.request({
      method: 'DELETE',
      endpoint: `brokerage/accounts/orders/${encodeURIComponent(orderId)}`,
    });
  }

  async getActivationTriggers(): Promise<JsonObject> {
    return this.dispatcher.request({ endpoint: 'brokerage/accounts/activationtriggers' });
  }

  async getRoutes(): Promise<JsonObject> {
    return this.dispatcher.request({ endpoint: 'brokerage/accounts/routes' });
  }
}
