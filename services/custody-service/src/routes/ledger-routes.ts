import type { FastifyInstance } from "fastify";
import type {
  AccountResponse,
  GetBalanceResponse,
  ListAccountsResponse,
  ListBalanceUpdatersResponse,
} from "@bullion/shared";
import type { CustodyCore } from "../core.js";
import {
  isNonEmptyString,
  parseCreateAccountRequest,
  parseSetBalanceUpdaterRequest,
  parseUpdateBalanceRequest,
} from "../http/parsers.js";
import { callerFrom } from "../http/request-context.js";

export function registerLedgerRoutes(app: FastifyInstance, core: CustodyCore): void {
  app.post("/accounts", async (req, reply) => {
    const parsed = parseCreateAccountRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected memberId and address",
      });
    }

    const account = core.ledger.createAccount(callerFrom(req.headers), parsed.memberId, parsed.address);
    const response: AccountResponse = { account };
    return reply.code(201).send(response);
  });

  app.get<{ Querystring: { memberId?: string; address?: string } }>("/accounts", async (req, reply) => {
    const { memberId, address } = req.query;
    if (isNonEmptyString(memberId)) {
      const response: ListAccountsResponse = { accounts: core.ledger.getAccountsByMember(memberId) };
      return response;
    }
    if (isNonEmptyString(address)) {
      const response: ListAccountsResponse = { accounts: core.ledger.getAccountsByAddress(address) };
      return response;
    }
    return reply.code(400).send({
      error: "invalid_request",
      message: "Expected memberId or address query parameter",
    });
  });

  app.get<{ Params: { accountId: string } }>("/accounts/:accountId", async (req) => {
    const response: AccountResponse = { account: core.ledger.getAccount(req.params.accountId) };
    return response;
  });

  app.get<{ Params: { accountId: string } }>("/accounts/:accountId/balance", async (req) => {
    const response: GetBalanceResponse = {
      accountId: req.params.accountId,
      balance: core.ledger.getAccountBalance(req.params.accountId),
    };
    return response;
  });

  app.post<{ Params: { accountId: string } }>("/accounts/:accountId/balance", async (req, reply) => {
    const parsed = parseUpdateBalanceRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected integer delta, reason and refId",
      });
    }

    const account = core.ledger.updateBalance(callerFrom(req.headers), {
      accountId: req.params.accountId,
      ...parsed,
    });
    const response: AccountResponse = { account };
    return response;
  });

  app.get("/ledger/updaters", async () => {
    const response: ListBalanceUpdatersResponse = { updaters: core.ledger.listBalanceUpdaters() };
    return response;
  });

  app.post("/ledger/updaters", async (req, reply) => {
    const parsed = parseSetBalanceUpdaterRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected updater and enabled",
      });
    }

    core.ledger.setBalanceUpdater(callerFrom(req.headers), parsed.updater, parsed.enabled);
    const response: ListBalanceUpdatersResponse = { updaters: core.ledger.listBalanceUpdaters() };
    return response;
  });
}
