/**
 * Valibot schemas for Bybit v5 spot REST and WebSocket payloads.
 *
 * Every REST response is wrapped in `{ retCode, retMsg, result, time }`;
 * non-zero codes are classified before schemas run.
 */

import * as v from "valibot";

import { decimalSchema } from "@/lib/decimal";

/** Bybit encodes millisecond timestamps as strings in most payloads */
export const bybitTimestampSchema = v.pipe(
  v.union([v.string(), v.number()]),
  v.transform((ms) => new Date(Number(ms))),
);

/** Empty string for "not applicable" (`avgPrice` of an unfilled order) */
export const bybitOptionalDecimalSchema = v.union([
  v.pipe(
    v.literal(""),
    v.transform(() => null),
  ),
  decimalSchema,
]);

export const bybitResponse = <TSchema extends v.GenericSchema>(result: TSchema) =>
  v.object({
    retCode: v.literal(0),
    result,
    time: v.number(),
  });

/** `[price, size]` */
export const BybitLevelSchema = v.pipe(
  v.tuple([decimalSchema, decimalSchema]),
  v.transform(([price, quantity]) => ({ price, quantity })),
);

// Market data

export const BybitInstrumentSchema = v.object({
  symbol: v.string(),
  baseCoin: v.string(),
  quoteCoin: v.string(),
  status: v.string(),
  lotSizeFilter: v.object({
    basePrecision: decimalSchema,
    minOrderQty: decimalSchema,
  }),
  priceFilter: v.object({
    tickSize: decimalSchema,
  }),
});

export const BybitInstrumentsSchema = bybitResponse(
  v.object({
    list: v.array(BybitInstrumentSchema),
    nextPageCursor: v.optional(v.string()),
  }),
);

export const BybitOrderBookSchema = bybitResponse(
  v.object({
    s: v.string(),
    b: v.array(BybitLevelSchema),
    a: v.array(BybitLevelSchema),
    ts: v.number(),
    u: v.number(),
  }),
);

export const BybitTickerSchema = v.object({
  symbol: v.string(),
  bid1Price: bybitOptionalDecimalSchema,
  ask1Price: bybitOptionalDecimalSchema,
  lastPrice: decimalSchema,
  volume24h: decimalSchema,
});

export const BybitTickersSchema = bybitResponse(
  v.object({
    list: v.array(BybitTickerSchema),
  }),
);

/** `[startTime, open, high, low, close, volume, turnover]`, newest first */
export const BybitKlineSchema = v.pipe(
  v.looseTuple([
    bybitTimestampSchema,
    decimalSchema,
    decimalSchema,
    decimalSchema,
    decimalSchema,
    decimalSchema,
  ]),
  v.transform(([openTime, open, high, low, close, volume]) => ({
    openTime,
    open,
    high,
    low,
    close,
    volume,
  })),
);

export const BybitKlinesSchema = bybitResponse(
  v.object({
    list: v.array(BybitKlineSchema),
  }),
);

// Orders and account

export const BybitOrderStatusSchema = v.picklist([
  "New",
  "PartiallyFilled",
  "Untriggered",
  "Triggered",
  "Rejected",
  "PartiallyFilledCanceled",
  "Filled",
  "Cancelled",
  "Deactivated",
]);

export const BybitOrderSchema = v.object({
  orderId: v.string(),
  orderLinkId: v.string(),
  symbol: v.string(),
  side: v.picklist(["Buy", "Sell"]),
  orderType: v.picklist(["Limit", "Market"]),
  orderStatus: BybitOrderStatusSchema,
  price: bybitOptionalDecimalSchema,
  qty: decimalSchema,
  cumExecQty: decimalSchema,
  avgPrice: bybitOptionalDecimalSchema,
  triggerPrice: v.optional(bybitOptionalDecimalSchema),
  createdTime: bybitTimestampSchema,
  updatedTime: bybitTimestampSchema,
});

export const BybitOrderPageSchema = bybitResponse(
  v.object({
    list: v.array(BybitOrderSchema),
    nextPageCursor: v.optional(v.string()),
  }),
);

export const BybitOrderAckSchema = bybitResponse(
  v.object({
    orderId: v.string(),
    orderLinkId: v.string(),
  }),
);

export const BybitCancelAllSchema = bybitResponse(
  v.object({
    list: v.array(v.object({ orderId: v.string(), orderLinkId: v.string() })),
  }),
);

export const BybitExecutionSchema = v.object({
  symbol: v.string(),
  orderId: v.string(),
  side: v.picklist(["Buy", "Sell"]),
  execId: v.string(),
  execPrice: decimalSchema,
  execQty: decimalSchema,
  execFee: decimalSchema,
  feeCurrency: v.optional(v.string()),
  execTime: bybitTimestampSchema,
  isMaker: v.boolean(),
});

export const BybitExecutionPageSchema = bybitResponse(
  v.object({
    list: v.array(BybitExecutionSchema),
    nextPageCursor: v.optional(v.string()),
  }),
);

export const BybitWalletBalanceSchema = bybitResponse(
  v.object({
    list: v.array(
      v.object({
        accountType: v.string(),
        coin: v.array(
          v.object({
            coin: v.string(),
            walletBalance: bybitOptionalDecimalSchema,
            locked: bybitOptionalDecimalSchema,
          }),
        ),
      }),
    ),
  }),
);

// WebSocket

export const BybitBookMessageSchema = v.object({
  topic: v.string(),
  type: v.picklist(["snapshot", "delta"]),
  ts: bybitTimestampSchema,
  data: v.object({
    s: v.string(),
    b: v.array(BybitLevelSchema),
    a: v.array(BybitLevelSchema),
    u: v.number(),
  }),
});

export const BybitTradeMessageSchema = v.object({
  topic: v.string(),
  data: v.array(
    v.object({
      i: v.string(),
      T: bybitTimestampSchema,
      p: decimalSchema,
      v: decimalSchema,
      /** Taker side */
      S: v.picklist(["Buy", "Sell"]),
      s: v.string(),
    }),
  ),
});

export const BybitTickerMessageSchema = v.object({
  topic: v.string(),
  ts: bybitTimestampSchema,
  data: v.object({
    symbol: v.string(),
    lastPrice: decimalSchema,
    volume24h: decimalSchema,
  }),
});

export const BybitOpResponseSchema = v.object({
  op: v.string(),
  success: v.optional(v.boolean()),
  ret_msg: v.optional(v.string()),
  req_id: v.optional(v.string()),
});
