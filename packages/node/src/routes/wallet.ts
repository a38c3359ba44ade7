/**
 * Multisig wallet routes.
 *
 * GET  /api/v1/wallet                            — Owners, threshold, balances
 * GET  /api/v1/wallet/transactions?status=       — List transactions
 * GET  /api/v1/wallet/transactions/:id           — Get one transaction
 * POST /api/v1/wallet/transactions               — Submit (auto-approves)
 * POST /api/v1/wallet/withdrawals                — Submit a withdrawal
 * POST /api/v1/wallet/transactions/:id/approve   — Approve (executes at threshold, reports the call result)
 * POST /api/v1/wallet/transactions/:id/execute   — Retry a failed execution
 */

import { Hono } from "hono";
import { EMPTY_PAYLOAD, encodeCall, hexToPayload } from "@phasevault/chain";
import type { MultisigTransaction } from "@phasevault/multisig";
import type { AppEnv } from "../types/api-contract.js";
import {
  IdParamSchema,
  ListTransactionsQuerySchema,
  SubmitTransactionSchema,
  WithdrawalSchema,
  toTransactionView,
  type SubmitTransactionDto,
  type TransactionView,
} from "../types/dto.js";
import { requireCaller } from "../middleware/caller.js";
import { parseBody, parseParam, parseQuery } from "../middleware/request.js";
import type { CustodyService } from "../services/custody-service.js";

function viewOf(service: CustodyService, transaction: MultisigTransaction): TransactionView {
  return toTransactionView(transaction, service.statusOf(transaction.id));
}

function payloadOf(body: SubmitTransactionDto): Uint8Array {
  if (body.call !== undefined) {
    return encodeCall(body.call.method, body.call.args);
  }
  if (body.payload !== undefined) {
    return hexToPayload(body.payload);
  }
  return EMPTY_PAYLOAD;
}

export function createWalletRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const summary = c.get("service").walletSummary();
    return c.json({
      data: {
        ...summary,
        balance: summary.balance.toString(),
        reservedValue: summary.reservedValue.toString(),
      },
    });
  });

  routes.get("/transactions", (c) => {
    const service = c.get("service");
    const query = parseQuery(c, ListTransactionsQuerySchema);
    const data = service.listTransactions(query.status).map((transaction) => viewOf(service, transaction));
    return c.json({ data });
  });

  routes.get("/transactions/:id", (c) => {
    const service = c.get("service");
    const id = parseParam(c.req.param("id"), IdParamSchema, "id");
    return c.json({ data: viewOf(service, service.getTransaction(id)) });
  });

  routes.post("/transactions", requireCaller(), async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, SubmitTransactionSchema);

    const transaction = service.submitTransaction(
      c.get("caller"),
      body.destination,
      body.value,
      payloadOf(body),
      body.attachedValue ?? body.value,
    );
    return c.json({ data: viewOf(service, transaction) }, 201);
  });

  routes.post("/withdrawals", requireCaller(), async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, WithdrawalSchema);

    const transaction = service.submitWithdrawal(c.get("caller"), body.destination, body.amount);
    return c.json({ data: viewOf(service, transaction) }, 201);
  });

  routes.post("/transactions/:id/approve", requireCaller(), (c) => {
    const service = c.get("service");
    const id = parseParam(c.req.param("id"), IdParamSchema, "id");

    const { transaction, result } = service.approveTransaction(c.get("caller"), id);
    return c.json({ data: { transaction: viewOf(service, transaction), result: result ?? null } });
  });

  routes.post("/transactions/:id/execute", requireCaller(), (c) => {
    const service = c.get("service");
    const id = parseParam(c.req.param("id"), IdParamSchema, "id");

    const { transaction, result } = service.executeTransaction(c.get("caller"), id);
    return c.json({ data: { transaction: viewOf(service, transaction), result } });
  });

  return routes;
}
