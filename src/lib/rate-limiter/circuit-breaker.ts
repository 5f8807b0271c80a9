/**
 * Circuit breaker wrapper around cockatiel.
 *
 * One breaker per exchange. Only TRANSPORT failures count towards opening
 * it: a rejected order or a bad signature says nothing about the health of
 * the venue. While open, calls fail fast with a non-retryable TRANSPORT error.
 *
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: After threshold failures, all requests fail fast
 * - HALF_OPEN: After reset timeout, one test request is let through
 */

import {
  BrokenCircuitError,
  CircuitState,
  ConsecutiveBreaker,
  circuitBreaker,
  handleWhen,
} from "cockatiel";

import { ExchangeError, isExchangeError } from "@/adapters/errors";

export type CircuitBreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  /** Number of consecutive failures before opening circuit */
  failureThreshold: number;
  /** Time in ms before attempting HALF_OPEN from OPEN */
  resetTimeoutMs: number;
}

export interface CircuitBreaker {
  /** Execute a function through the circuit breaker */
  execute: <T>(fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal) => Promise<T>;
  /** Get the current state of the circuit breaker */
  getState: () => CircuitBreakerState;
  /** Check if the circuit is currently open */
  isOpen: () => boolean;
  /** Subscribe to state change events */
  onStateChange: (callback: (state: CircuitBreakerState) => void) => () => void;
}

/**
 * Default circuit breaker configuration.
 */
export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 30000,
};

/**
 * Maps cockatiel CircuitState to our CircuitBreakerState type.
 */
const mapCircuitState = (state: CircuitState): CircuitBreakerState => {
  switch (state) {
    case CircuitState.Closed:
      return "CLOSED";
    case CircuitState.Open:
    case CircuitState.Isolated:
      return "OPEN";
    case CircuitState.HalfOpen:
      return "HALF_OPEN";
    default:
      return "CLOSED";
  }
};

export const isTransportFailure = (error: unknown): boolean =>
  isExchangeError(error) && error.kind === "TRANSPORT";

/**
 * Creates a circuit breaker using cockatiel.
 *
 * @example
 * ```typescript
 * const breaker = createCircuitBreaker("binance", {
 *   failureThreshold: 5,
 *   resetTimeoutMs: 30000,
 * });
 *
 * const result = await breaker.execute(async (signal) => fetch(url, { signal }));
 * ```
 */
export const createCircuitBreaker = (
  exchange: string,
  config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
): CircuitBreaker => {
  const { failureThreshold, resetTimeoutMs } = config;

  const breaker = circuitBreaker(handleWhen(isTransportFailure), {
    halfOpenAfter: resetTimeoutMs,
    breaker: new ConsecutiveBreaker(failureThreshold),
  });

  const stateChangeListeners = new Set<(state: CircuitBreakerState) => void>();

  breaker.onStateChange((state) => {
    const mappedState = mapCircuitState(state);
    for (const listener of stateChangeListeners) {
      listener(mappedState);
    }
  });

  const execute = async <T>(
    fn: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> => {
    try {
      return await breaker.execute(({ signal: policySignal }) => fn(policySignal), signal);
    } catch (error) {
      if (error instanceof BrokenCircuitError) {
        throw new ExchangeError(
          "TRANSPORT",
          `Circuit breaker is open after ${failureThreshold} consecutive transport failures`,
          { exchange, retryable: false, cause: error },
        );
      }
      throw error;
    }
  };

  const onStateChange = (callback: (state: CircuitBreakerState) => void): (() => void) => {
    stateChangeListeners.add(callback);
    return () => {
      stateChangeListeners.delete(callback);
    };
  };

  return {
    execute,
    getState: () => mapCircuitState(breaker.state),
    isOpen: () => breaker.state === CircuitState.Open || breaker.state === CircuitState.Isolated,
    onStateChange,
  };
};
