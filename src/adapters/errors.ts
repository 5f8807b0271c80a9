/**
 * Error taxonomy shared by every exchange adapter.
 *
 * Every failure an adapter surfaces is an {@link ExchangeError} whose `kind`
 * decides what the caller (and the transport's retry schedule) may do next:
 *
 * - `TRANSPORT`: network or server failure, retryable
 * - `RATE_LIMITED`: retryable after `retryAfterMs`
 * - `AUTH`: credentials rejected, fatal
 * - `REJECTED`: the exchange refused the request, see `reason`
 * - `PROTOCOL`: unexpected payload, fatal
 * - `SEQUENCE_GAP`: stream continuity lost, triggers a resync
 */

export type ExchangeErrorKind =
  | "TRANSPORT"
  | "RATE_LIMITED"
  | "AUTH"
  | "REJECTED"
  | "PROTOCOL"
  | "SEQUENCE_GAP";

export type RejectionReason =
  | "INSUFFICIENT_BALANCE"
  | "INVALID_ORDER"
  | "ORDER_NOT_FOUND"
  | "DUPLICATE_ORDER"
  | "UNKNOWN";

export interface ExchangeErrorDetails {
  exchange: string;
  operation?: string;
  status?: number;
  /** Exchange-native error code (`-2010`, `170131`, ...) */
  exchangeCode?: string;
  reason?: RejectionReason;
  retryAfterMs?: number;
  attempts?: number;
  /** Overrides the kind's default retryability */
  retryable?: boolean;
  cause?: unknown;
}

const RETRYABLE_KINDS: ReadonlySet<ExchangeErrorKind> = new Set(["TRANSPORT", "RATE_LIMITED"]);

export class ExchangeError extends Error {
  public override readonly name = "ExchangeError";
  public readonly exchange: string;
  public readonly operation: string | undefined;
  public readonly status: number | undefined;
  public readonly exchangeCode: string | undefined;
  public readonly reason: RejectionReason | undefined;
  public readonly retryAfterMs: number | undefined;
  public readonly attempts: number | undefined;
  private readonly retryableOverride: boolean | undefined;

  constructor(
    public readonly kind: ExchangeErrorKind,
    message: string,
    details: ExchangeErrorDetails,
  ) {
    super(message, { cause: details.cause });
    this.exchange = details.exchange;
    this.operation = details.operation;
    this.status = details.status;
    this.exchangeCode = details.exchangeCode;
    this.reason = kind === "REJECTED" ? (details.reason ?? "UNKNOWN") : details.reason;
    this.retryAfterMs = details.retryAfterMs;
    this.attempts = details.attempts;
    this.retryableOverride = details.retryable;
  }

  get retryable(): boolean {
    return this.retryableOverride ?? RETRYABLE_KINDS.has(this.kind);
  }

  /** Returns a copy carrying extra details (operation name, attempt count). */
  withDetails(details: Partial<Omit<ExchangeErrorDetails, "exchange">>): ExchangeError {
    return new ExchangeError(this.kind, this.message, {
      exchange: this.exchange,
      operation: details.operation ?? this.operation,
      status: details.status ?? this.status,
      exchangeCode: details.exchangeCode ?? this.exchangeCode,
      reason: details.reason ?? this.reason,
      retryAfterMs: details.retryAfterMs ?? this.retryAfterMs,
      attempts: details.attempts ?? this.attempts,
      retryable: details.retryable ?? this.retryableOverride,
      cause: details.cause ?? this.cause,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      exchange: this.exchange,
      operation: this.operation,
      status: this.status,
      exchangeCode: this.exchangeCode,
      reason: this.reason,
      retryAfterMs: this.retryAfterMs,
      attempts: this.attempts,
    };
  }
}

export const isExchangeError = (error: unknown): error is ExchangeError =>
  error instanceof ExchangeError;

export const isRejection = (error: unknown, reason?: RejectionReason): error is ExchangeError =>
  isExchangeError(error) &&
  error.kind === "REJECTED" &&
  (reason === undefined || error.reason === reason);

/**
 * The caller's deadline elapsed (request timeout or rate-limiter admission).
 */
export class DeadlineExceededError extends Error {
  public override readonly name = "DeadlineExceededError";

  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
  }
}

/**
 * The caller cancelled the operation through its AbortSignal.
 */
export class RequestAbortedError extends Error {
  public override readonly name = "RequestAbortedError";

  constructor(message = "Request aborted", cause?: unknown) {
    super(message, { cause });
  }
}

export class ConfigError extends Error {
  public override readonly name = "ConfigError";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}
