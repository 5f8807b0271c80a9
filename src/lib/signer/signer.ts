/**
 * Request signing with a per-signer monotonic timestamp.
 *
 * Each signer owns its credentials and its counter. Two requests signed by
 * the same signer never share a timestamp, which is what exchanges check for
 * replay protection. Passing `timestamp` explicitly makes signing
 * deterministic (identical inputs give identical output) and leaves the
 * counter's clock alone.
 */

import { createHmac } from "node:crypto";

import * as v from "valibot";

import { ExchangeError } from "@/adapters/errors";
import { type Credentials, credentialsSchema } from "@/adapters/types";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryParams = ReadonlyArray<readonly [string, string]>;

export interface SignableRequest {
  method: HttpMethod;
  path: string;
  /** Query parameters in the order they are sent */
  query: QueryParams;
  /** Serialized request body */
  body?: string;
}

export interface SigningContext {
  credentials: Credentials;
  request: SignableRequest;
  /** Encoded query string before any signing parameters are added */
  queryString: string;
  timestamp: number;
}

export interface SignatureParts {
  /** Final query string sent on the wire */
  queryString: string;
  headers: Record<string, string>;
}

/** An exchange's authentication scheme. Must be a pure function of its input. */
export type SigningScheme = (context: SigningContext) => SignatureParts;

export interface SignedRequest extends SignatureParts {
  method: HttpMethod;
  path: string;
  body: string | undefined;
  timestamp: number;
}

export interface SignerConfig {
  exchange: string;
  credentials: Credentials;
  scheme: SigningScheme;
  /** Wall clock in ms (default: Date.now) */
  clock?: () => number;
}

export interface SignOptions {
  /** Fixed timestamp; skips the monotonic clock */
  timestamp?: number;
}

export interface Signer {
  readonly exchange: string;
  readonly apiKey: string;
  sign: (request: SignableRequest, options?: SignOptions) => SignedRequest;
  /** Number of requests signed so far */
  getSignedCount: () => number;
}

export const encodeQuery = (query: QueryParams): string =>
  query.map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`).join("&");

export const hmacSha256Hex = (secret: string, payload: string): string =>
  createHmac("sha256", secret).update(payload).digest("hex");

/**
 * Creates a signer. Malformed credentials fail here, before anything is
 * signed, with a fatal AUTH error.
 *
 * @example
 * ```typescript
 * const signer = createSigner({
 *   exchange: "binance",
 *   credentials: { exchange: "binance", apiKey: "key", apiSecret: "secret" },
 *   scheme: binanceSigningScheme,
 * });
 * const signed = signer.sign({ method: "GET", path: "/api/v3/account", query: [] });
 * ```
 */
export const createSigner = (config: SignerConfig): Signer => {
  const { exchange, scheme, clock = Date.now } = config;

  const parsed = v.safeParse(credentialsSchema, config.credentials);
  if (!parsed.success) {
    const fields = new Set(
      parsed.issues
        .map((issue) => issue.path?.map((item) => String(item.key)).join("."))
        .filter((field): field is string => field !== undefined),
    );
    throw new ExchangeError("AUTH", `Malformed credentials: ${[...fields].join(", ") || "invalid"}`, {
      exchange,
      operation: "sign",
    });
  }
  const credentials = parsed.output;

  if (credentials.exchange !== exchange) {
    throw new ExchangeError(
      "AUTH",
      `Credentials for ${credentials.exchange} cannot sign ${exchange} requests`,
      { exchange, operation: "sign" },
    );
  }

  let lastTimestamp = 0;
  let signedCount = 0;

  // Synchronous: the read-modify-write of the counter cannot interleave
  const nextTimestamp = (): number => {
    const now = Math.floor(clock());
    lastTimestamp = now > lastTimestamp ? now : lastTimestamp + 1;
    return lastTimestamp;
  };

  const sign = (request: SignableRequest, options: SignOptions = {}): SignedRequest => {
    const timestamp = options.timestamp ?? nextTimestamp();
    signedCount++;

    const parts = scheme({
      credentials,
      request,
      queryString: encodeQuery(request.query),
      timestamp,
    });

    return {
      method: request.method,
      path: request.path,
      body: request.body,
      timestamp,
      ...parts,
    };
  };

  return {
    exchange,
    apiKey: credentials.apiKey,
    sign,
    getSignedCount: () => signedCount,
  };
};
