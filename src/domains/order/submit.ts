/**
 * Order submission pipeline shared by the REST adapters: market lookup,
 * pre-flight validation, client id assignment and deduplication, in that
 * order. Only the exchange call itself is adapter-specific.
 */

import type { Exchange, Order, OrderRequest, RequestOptions } from "@/adapters/types";
import type { MarketCache } from "@/domains/market";

import { type IdempotencyWindow, generateClientOrderId } from "./idempotency";
import { validateOrderRequest } from "./validate";

/** A request whose idempotency token has been fixed */
export type IdentifiedOrderRequest = OrderRequest & { clientOrderId: string };

export interface OrderSubmitterConfig {
  exchange: Exchange;
  markets: MarketCache;
  window: IdempotencyWindow;
  /** Sends the order; retried attempts reuse the same client id */
  send: (request: IdentifiedOrderRequest, options?: RequestOptions) => Promise<Order>;
  /** Looks up the order accepted under a client id */
  fetchByClientId: (symbol: string, clientOrderId: string, options?: RequestOptions) => Promise<Order>;
}

export type OrderSubmitter = (request: OrderRequest, options?: RequestOptions) => Promise<Order>;

export const createOrderSubmitter = (submitterConfig: OrderSubmitterConfig): OrderSubmitter => {
  const { exchange, markets, window, send, fetchByClientId } = submitterConfig;

  return async (request, options) => {
    const market = await markets.get(request.symbol, options);
    validateOrderRequest(request, market, exchange);

    const identified: IdentifiedOrderRequest = {
      ...request,
      clientOrderId: request.clientOrderId ?? generateClientOrderId(),
    };

    return window.submit(identified.clientOrderId, {
      place: () => send(identified, options),
      fetchExisting: () => fetchByClientId(identified.symbol, identified.clientOrderId, options),
    });
  };
};
