export {
  createIdempotencyWindow,
  generateClientOrderId,
  type IdempotencyStats,
  type IdempotencyWindow,
  type IdempotencyWindowConfig,
  type SubmitHandlers,
} from "./idempotency";
export {
  applyOrderUpdate,
  canTransition,
  isTerminalOrderStatus,
  ORDER_TERMINAL_STATES,
  ORDER_TRANSITIONS,
  type TransitionResult,
} from "./order-state";
export {
  createOrderSubmitter,
  type IdentifiedOrderRequest,
  type OrderSubmitter,
  type OrderSubmitterConfig,
} from "./submit";
export { findOrderViolations, validateOrderLookup, validateOrderRequest } from "./validate";
