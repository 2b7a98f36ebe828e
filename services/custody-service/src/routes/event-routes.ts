import type { FastifyInstance } from "fastify";
import {
  isCustodyEventType,
  type ListEventsResponse,
  type VerifyEventChainResponse,
} from "@bullion/shared";
import type { CustodyCore } from "../core.js";
import { isNonEmptyString, parseLimit } from "../http/parsers.js";

export function registerEventRoutes(app: FastifyInstance, core: CustodyCore): void {
  app.get<{ Querystring: { ref?: string; type?: string; limit?: string } }>("/events", async (req, reply) => {
    const { ref, type } = req.query;
    if (type !== undefined && !isCustodyEventType(type)) {
      return reply.code(400).send({ error: "invalid_event_type" });
    }
    const limit = parseLimit(req.query.limit);
    if (limit === null) {
      return reply.code(400).send({ error: "invalid_limit", message: "limit must be between 1 and 1000" });
    }

    const response: ListEventsResponse = {
      events: core.events.list({
        ...(isNonEmptyString(ref) ? { ref } : {}),
        ...(type !== undefined ? { type } : {}),
        ...(limit !== undefined ? { limit } : {}),
      }),
    };
    return response;
  });

  app.get("/events/verify", async () => {
    const response: VerifyEventChainResponse = core.events.verifyChain();
    return response;
  });
}
