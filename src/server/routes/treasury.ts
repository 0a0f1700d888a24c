import { Hono } from "hono";
import * as v from "valibot";

import { CollaboratorError, type InMemoryTreasury } from "@/adapters";
import type { LedgerJournal } from "@/engine/journal";
import { decimalStringSchema, formatDecimal } from "@/lib/decimal";

const DepositSchema = v.object({
  account: v.pipe(v.string(), v.minLength(1)),
  amount: decimalStringSchema,
});

export const createTreasuryRoute = (
  treasury: Pick<InMemoryTreasury, "balanceOf" | "deposit">,
  journal: Pick<LedgerJournal, "persistBalances">,
): Hono => {
  const routes = new Hono();

  routes.get("/balances/:account", (c) => {
    const account = c.req.param("account");
    return c.json({ account, balance: formatDecimal(treasury.balanceOf(account)) });
  });

  routes.post("/deposits", async (c) => {
    const body: unknown = await c.req.json().catch(() => undefined);
    const parsed = v.safeParse(DepositSchema, body);
    if (!parsed.success) {
      return c.json({ error: "INVALID_REQUEST", message: v.summarize(parsed.issues) }, 400);
    }

    const { account, amount } = parsed.output;
    try {
      treasury.deposit(account, amount);
    } catch (error) {
      if (error instanceof CollaboratorError) {
        return c.json({ error: error.code, message: error.message }, 422);
      }
      throw error;
    }
    await journal.persistBalances();
    return c.json({ account, balance: formatDecimal(treasury.balanceOf(account)) }, 201);
  });

  return routes;
};
