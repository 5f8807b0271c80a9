/**
 * Order lifecycle rules. Exchanges report order state from REST polls, stream
 * pushes and cancel responses in no guaranteed order, so every update is
 * checked against the state already held before it replaces it.
 */

import type { Order, OrderStatus } from "@/adapters/types";
import { compareDecimal } from "@/lib/decimal";

export type TransitionResult<T> =
  | { ok: true; state: T; from: OrderStatus; to: OrderStatus; changed: boolean }
  | { ok: false; error: string };

/**
 * Valid transitions from each order status.
 *
 * Terminal states (FILLED, CANCELLED, REJECTED, EXPIRED) have empty arrays.
 */
export const ORDER_TRANSITIONS: Record<OrderStatus, OrderStatus[]> = {
  OPEN: ["OPEN", "PARTIALLY_FILLED", "FILLED", "CANCELLED", "REJECTED", "EXPIRED"],
  PARTIALLY_FILLED: ["PARTIALLY_FILLED", "FILLED", "CANCELLED", "EXPIRED"],
  FILLED: [],
  CANCELLED: [],
  REJECTED: [],
  EXPIRED: [],
};

export const ORDER_TERMINAL_STATES: readonly OrderStatus[] = [
  "FILLED",
  "CANCELLED",
  "REJECTED",
  "EXPIRED",
] as const;

export const isTerminalOrderStatus = (status: OrderStatus): boolean =>
  ORDER_TERMINAL_STATES.includes(status);

export const canTransition = (from: OrderStatus, to: OrderStatus): boolean =>
  ORDER_TRANSITIONS[from].includes(to);

/**
 * Merge a newer view of an order into the one already known.
 *
 * A repeated terminal report is accepted as a no-op (`changed: false`). Any
 * move out of a terminal state, any transition missing from
 * {@link ORDER_TRANSITIONS} and any decrease of the filled quantity is refused.
 * The creation time of the known order is kept.
 *
 * @example
 * ```typescript
 * const result = applyOrderUpdate(known, fromStream);
 * if (result.ok) {
 *   known = result.state;
 * }
 * ```
 */
export const applyOrderUpdate = (current: Order, update: Order): TransitionResult<Order> => {
  if (current.id !== update.id) {
    return {
      ok: false,
      error: `Order id mismatch: ${current.id} vs ${update.id}`,
    };
  }

  const from = current.status;
  const to = update.status;

  if (isTerminalOrderStatus(from)) {
    if (from === to) {
      return { ok: true, state: current, from, to, changed: false };
    }
    return {
      ok: false,
      error: `Cannot transition from terminal state: ${from}`,
    };
  }

  if (!canTransition(from, to)) {
    return {
      ok: false,
      error: `Invalid transition from ${from} to ${to}`,
    };
  }

  if (compareDecimal(update.filledQuantity, current.filledQuantity) < 0) {
    return {
      ok: false,
      error: "Filled quantity cannot decrease",
    };
  }

  return {
    ok: true,
    state: {
      ...update,
      clientOrderId: update.clientOrderId ?? current.clientOrderId,
      createdAt: current.createdAt,
    },
    from,
    to,
    changed: true,
  };
};
