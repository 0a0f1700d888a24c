import { Hono } from "hono";
import * as v from "valibot";

import { isPerpsError, isRetryableError } from "@/domains/errors";
import type { CommandValue, EngineCommand, MarketDispatcher } from "@/engine/dispatcher";
import { decimalStringSchema, formatDecimal } from "@/lib/decimal";

import { renderPosition } from "./markets";

const accountSchema = v.pipe(v.string(), v.minLength(1));

const tradeOptionsSchema = v.optional(
  v.object({
    feeRate: v.optional(decimalStringSchema),
    trackingCode: v.optional(v.pipe(v.string(), v.minLength(1))),
  }),
);

/** Command bodies carry amounts as decimal strings; the market comes from the path. */
export const CommandBodySchema = v.variant("type", [
  v.object({
    type: v.literal("TRANSFER_MARGIN"),
    account: accountSchema,
    marginDelta: decimalStringSchema,
  }),
  v.object({ type: v.literal("WITHDRAW_ALL_MARGIN"), account: accountSchema }),
  v.object({
    type: v.literal("MODIFY_LOCKED_MARGIN"),
    account: accountSchema,
    delta: decimalStringSchema,
  }),
  v.object({
    type: v.literal("MODIFY_POSITION"),
    account: accountSchema,
    sizeDelta: decimalStringSchema,
    options: tradeOptionsSchema,
  }),
  v.object({ type: v.literal("CLOSE_POSITION"), account: accountSchema, options: tradeOptionsSchema }),
  v.object({
    type: v.literal("LIQUIDATE_POSITION"),
    account: accountSchema,
    liquidator: accountSchema,
  }),
  v.object({ type: v.literal("RECOMPUTE_FUNDING") }),
]);

const renderValue = (value: CommandValue) => {
  if (typeof value === "number") {
    return { fundingIndex: value };
  }
  if ("keeperFee" in value) {
    return {
      position: renderPosition(value.position),
      price: formatDecimal(value.price),
      keeperFee: formatDecimal(value.keeperFee),
      poolFee: formatDecimal(value.poolFee),
    };
  }
  return { position: renderPosition(value) };
};

const renderError = (error: Error) => {
  if (!isPerpsError(error)) {
    return { status: 500, body: { error: "INTERNAL_ERROR", message: error.message } } as const;
  }
  const body = { error: error.code, message: error.message };
  if (isRetryableError(error)) {
    return { status: 503, body } as const;
  }
  return { status: error.code === "MARKET_NOT_FOUND" ? 404 : 422, body } as const;
};

export const createCommandsRoute = (dispatcher: Pick<MarketDispatcher, "dispatch">): Hono => {
  const commands = new Hono();

  commands.post("/:marketKey/commands", async (c) => {
    const body: unknown = await c.req.json().catch(() => undefined);
    const parsed = v.safeParse(CommandBodySchema, body);
    if (!parsed.success) {
      return c.json({ error: "INVALID_REQUEST", message: v.summarize(parsed.issues) }, 400);
    }

    const command: EngineCommand = { ...parsed.output, marketKey: c.req.param("marketKey") };
    const result = await dispatcher.dispatch(command);
    if (!result.ok) {
      const { status, body: error } = renderError(result.error);
      return c.json(error, status);
    }
    return c.json(renderValue(result.value));
  });

  return commands;
};
