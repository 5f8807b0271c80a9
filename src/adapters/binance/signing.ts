/**
 * Binance SIGNED endpoint authentication.
 *
 * `recvWindow` and `timestamp` are appended to the query, then the whole
 * query string (plus any body) is signed with HMAC-SHA256 and sent as the
 * final `signature` parameter. The key travels in `X-MBX-APIKEY`.
 */

import { type SigningScheme, hmacSha256Hex } from "@/lib/signer";

export const BINANCE_RECV_WINDOW_MS = 5000;

export const binanceSigningScheme: SigningScheme = ({ credentials, request, queryString, timestamp }) => {
  const unsigned = [queryString, `recvWindow=${BINANCE_RECV_WINDOW_MS}`, `timestamp=${timestamp}`]
    .filter((part) => part.length > 0)
    .join("&");
  const signature = hmacSha256Hex(credentials.apiSecret, `${unsigned}${request.body ?? ""}`);

  return {
    queryString: `${unsigned}&signature=${signature}`,
    headers: { "X-MBX-APIKEY": credentials.apiKey },
  };
};
