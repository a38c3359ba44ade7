/**
 * Token routes.
 *
 * GET /api/v1/tokens                       — Token metadata and supply
 * GET /api/v1/tokens/balances/:address     — Native, token and vesting balances
 */

import { Hono } from "hono";
import { addressSchema } from "@phasevault/chain";
import { formatAmount } from "@phasevault/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { parseParam } from "../middleware/request.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const summary = c.get("service").tokenSummary();
    return c.json({
      data: {
        ...summary,
        totalSupply: summary.totalSupply.toString(),
        formattedTotalSupply: formatAmount(summary.totalSupply, summary.decimals),
      },
    });
  });

  routes.get("/balances/:address", (c) => {
    const service = c.get("service");
    const address = parseParam(c.req.param("address"), addressSchema, "address");
    const { decimals, symbol } = service.tokenSummary();
    const balances = service.balancesOf(address);

    return c.json({
      data: {
        address,
        native: balances.native.toString(),
        token: {
          symbol,
          decimals,
          amount: balances.token.toString(),
          formatted: formatAmount(balances.token, decimals),
        },
        vesting:
          balances.vested === undefined
            ? null
            : {
                vested: balances.vested.vested.toString(),
                released: balances.vested.released.toString(),
                releasable: balances.vested.releasable.toString(),
              },
      },
    });
  });

  return routes;
}
