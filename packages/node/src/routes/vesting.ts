/**
 * Vesting routes.
 *
 * GET  /api/v1/vesting/types                     — Published templates
 * GET  /api/v1/vesting/types/:id                 — One template
 * GET  /api/v1/vesting/schedules/:beneficiary    — Schedule with accrual
 * POST /api/v1/vesting/release                   — Release the caller's vested tokens
 *
 * Administration (types, schedules, termination) has no route of its
 * own: it is a wallet transaction whose destination is the engine.
 */

import { Hono } from "hono";
import { addressSchema } from "@phasevault/chain";
import type { AppEnv } from "../types/api-contract.js";
import { IdParamSchema, toScheduleView, toVestingTypeView } from "../types/dto.js";
import { requireCaller } from "../middleware/caller.js";
import { parseParam } from "../middleware/request.js";

export function createVestingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/types", (c) => {
    return c.json({ data: c.get("service").listVestingTypes().map(toVestingTypeView) });
  });

  routes.get("/types/:id", (c) => {
    const id = parseParam(c.req.param("id"), IdParamSchema, "id");
    return c.json({ data: toVestingTypeView(c.get("service").getVestingType(id)) });
  });

  routes.get("/schedules/:beneficiary", (c) => {
    const beneficiary = parseParam(c.req.param("beneficiary"), addressSchema, "beneficiary");
    const { schedule, amounts, vestedBps } = c.get("service").scheduleStatus(beneficiary);
    return c.json({ data: toScheduleView(schedule, amounts, vestedBps) });
  });

  routes.post("/release", requireCaller(), (c) => {
    const caller = c.get("caller");
    const amount = c.get("service").release(caller);
    return c.json({ data: { beneficiary: caller, amount: amount.toString() } });
  });

  return routes;
}
