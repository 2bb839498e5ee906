import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { STAGES, STAGE_STATUSES } from "@pressline/press-db";
import type { GatewayDeps } from "../deps.js";

export async function registerRecords(app: FastifyInstance, deps: Pick<GatewayDeps, "ledger" | "leases">) {
  app.get("/v1/records", async (req, reply) => {
    const Schema = z.object({
      stage: z.enum(STAGES).optional(),
      status: z.string().optional().transform((v, ctx) => {
        if (v === undefined) return undefined;
        const status = STAGE_STATUSES.find((s) => s === v.toUpperCase());
        if (!status) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown status ${v}` });
          return z.NEVER;
        }
        return status;
      }),
      itemId: z.string().min(1).optional(),
      limit: z.coerce.number().int().min(1).max(500).default(50)
    });

    const parsed = Schema.safeParse(req.query);
    if (!parsed.success) {
      reply.code(400);
      return { error: "invalid_query", issues: parsed.error.issues };
    }
    const records = await deps.ledger.list(parsed.data);
    return { records };
  });

  app.get("/v1/leases", async (req, reply) => {
    const parsed = z.object({ scope: z.string().min(1).optional() }).safeParse(req.query);
    if (!parsed.success) {
      reply.code(400);
      return { error: "invalid_query", issues: parsed.error.issues };
    }
    // Tokens stay server-side; holding one is enough to release the lease
    const leases = await deps.leases.active(parsed.data.scope);
    return {
      leases: leases.map(({ token: _token, ...lease }) => lease)
    };
  });
}
