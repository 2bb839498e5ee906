import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { STAGES, IllegalTransitionError, type StageRecord } from "@pressline/press-db";
import { ConflictError, RecordNotFoundError, resetStageRecord } from "@pressline/press-engine";
import type { GatewayDeps } from "../deps.js";

const ItemParams = z.object({ itemId: z.string().min(1) });
const StageParams = ItemParams.extend({ stage: z.enum(STAGES) });

export async function registerItems(app: FastifyInstance, deps: GatewayDeps) {
  app.get("/v1/items", async (req, reply) => {
    const Schema = z.object({ limit: z.coerce.number().int().min(1).max(500).default(50) });
    const parsed = Schema.safeParse(req.query);
    if (!parsed.success) {
      reply.code(400);
      return { error: "invalid_query", issues: parsed.error.issues };
    }
    const items = await deps.items.list({ limit: parsed.data.limit });
    return { items };
  });

  app.get("/v1/items/:itemId", async (req, reply) => {
    const parsed = ItemParams.safeParse(req.params);
    if (!parsed.success) {
      reply.code(400);
      return { error: "invalid_params", issues: parsed.error.issues };
    }
    const item = await deps.items.get(parsed.data.itemId);
    if (!item) {
      reply.code(404);
      return { error: "item_not_found" };
    }
    const stages: Record<string, StageRecord | null> = {};
    for (const stage of STAGES) {
      stages[stage] = await deps.ledger.get(item.item_id, stage);
    }
    return { item, stages };
  });

  app.get("/v1/items/:itemId/stages/:stage/history", async (req, reply) => {
    const parsed = StageParams.safeParse(req.params);
    if (!parsed.success) {
      reply.code(400);
      return { error: "invalid_params", issues: parsed.error.issues };
    }
    const history = await deps.ledger.history(parsed.data.itemId, parsed.data.stage);
    return { history };
  });

  app.post("/v1/items/:itemId/stages/:stage/reset", async (req, reply) => {
    const params = StageParams.safeParse(req.params);
    if (!params.success) {
      reply.code(400);
      return { error: "invalid_params", issues: params.error.issues };
    }
    const body = z.object({ expectedRevision: z.number().int().positive().optional() }).safeParse(req.body ?? {});
    if (!body.success) {
      reply.code(400);
      return { error: "invalid_body", issues: body.error.issues };
    }

    const { itemId, stage } = params.data;
    try {
      const record = await resetStageRecord(deps.ledger, itemId, stage, body.data.expectedRevision);
      req.log.info({ itemId, stage, generation: record.generation }, "stage_reset");
      return { record };
    } catch (err) {
      if (err instanceof RecordNotFoundError) {
        reply.code(404);
        return { error: "record_not_found" };
      }
      if (err instanceof ConflictError) {
        reply.code(409);
        return { error: "conflict", current: await deps.ledger.get(itemId, stage) };
      }
      if (err instanceof IllegalTransitionError) {
        reply.code(409);
        return { error: "illegal_transition", message: err.message };
      }
      throw err;
    }
  });
}
