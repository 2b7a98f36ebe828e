import type { FastifyInstance } from "fastify";
import {
  type ExecutionOptionsResponse,
  isOrderStatus,
  type ListOrdersResponse,
  type OrderResponse,
} from "@bullion/shared";
import type { CustodyCore } from "../core.js";
import {
  parseCancelOrderRequest,
  parseExecutionOptionsRequest,
  parsePrepareOrderRequest,
  parseSignOrderRequest,
} from "../http/parsers.js";
import { callerFrom } from "../http/request-context.js";

type OrderRoute = { Params: { txRef: string } };

export function registerOrderRoutes(app: FastifyInstance, core: CustodyCore): void {
  app.post("/orders/prepare", async (req, reply) => {
    const parsed = parsePrepareOrderRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message:
          "Expected externalRef, txRef, orderType, initiatorId, counterpartyId, sourceAccountId, destAccountId, tokenIds, settlementDate, currency, price, fee",
      });
    }

    const order = core.settlement.prepareOrder(callerFrom(req.headers), parsed);
    const response: OrderResponse = { order };
    return reply.code(201).send(response);
  });

  app.get<{ Querystring: { status?: string } }>("/orders", async (req, reply) => {
    const { status } = req.query;
    if (status !== undefined && !isOrderStatus(status)) {
      return reply.code(400).send({ error: "invalid_status" });
    }
    const response: ListOrdersResponse = { orders: core.settlement.listOrders(status) };
    return response;
  });

  app.get<OrderRoute>("/orders/:txRef", async (req) => {
    const response: OrderResponse = { order: core.settlement.getOrder(req.params.txRef) };
    return response;
  });

  app.post<OrderRoute>("/orders/:txRef/sign", async (req, reply) => {
    const parsed = parseSignOrderRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected signature and partyLabel",
      });
    }

    const order = core.settlement.signOrder(
      callerFrom(req.headers),
      req.params.txRef,
      parsed.signature,
      parsed.partyLabel,
    );
    const response: OrderResponse = { order };
    return response;
  });

  app.post<OrderRoute>("/orders/:txRef/execute", async (req) => {
    const order = core.settlement.executeOrder(callerFrom(req.headers), req.params.txRef);
    const response: OrderResponse = { order };
    return response;
  });

  app.post<OrderRoute>("/orders/:txRef/cancel", async (req, reply) => {
    const parsed = parseCancelOrderRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected reason",
      });
    }

    const order = core.settlement.cancelOrder(callerFrom(req.headers), req.params.txRef, parsed.reason);
    const response: OrderResponse = { order };
    return response;
  });

  app.get("/settlement/options", async () => {
    const response: ExecutionOptionsResponse = { options: core.settlement.getExecutionOptions() };
    return response;
  });

  app.post("/settlement/options", async (req, reply) => {
    const parsed = parseExecutionOptionsRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected boolean enableOnChainTransfer and enableAutoLedgerUpdate",
      });
    }

    const options = core.settlement.setExecutionOptions(callerFrom(req.headers), parsed);
    const response: ExecutionOptionsResponse = { options };
    return response;
  });
}
