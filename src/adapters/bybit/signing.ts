/**
 * Bybit v5 authentication: HMAC-SHA256 over
 * `timestamp + apiKey + recvWindow + payload`, where the payload is the
 * query string for GET and the JSON body otherwise.
 */

import { type SigningScheme, hmacSha256Hex } from "@/lib/signer";

export const BYBIT_RECV_WINDOW_MS = 5000;

export const bybitSigningScheme: SigningScheme = ({ credentials, request, queryString, timestamp }) => {
  const payload = request.method === "GET" ? queryString : (request.body ?? "");
  const signature = hmacSha256Hex(
    credentials.apiSecret,
    `${timestamp}${credentials.apiKey}${BYBIT_RECV_WINDOW_MS}${payload}`,
  );

  return {
    queryString,
    headers: {
      "X-BAPI-API-KEY": credentials.apiKey,
      "X-BAPI-TIMESTAMP": String(timestamp),
      "X-BAPI-RECV-WINDOW": String(BYBIT_RECV_WINDOW_MS),
      "X-BAPI-SIGN": signature,
    },
  };
};
