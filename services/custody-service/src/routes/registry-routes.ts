import type { FastifyInstance } from "fastify";
import { type MemberResponse, type PrincipalResponse, RoleSet } from "@bullion/shared";
import type { CustodyCore } from "../core.js";
import {
  parseAssignRolesRequest,
  parseRegisterMemberRequest,
  parseSetBlacklistedRequest,
  parseSetMemberStatusRequest,
} from "../http/parsers.js";
import { callerFrom } from "../http/request-context.js";

export function registerRegistryRoutes(app: FastifyInstance, core: CustodyCore): void {
  app.post("/registry/members", async (req, reply) => {
    const parsed = parseRegisterMemberRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected memberId and optional status",
      });
    }

    const member = core.registry.registerMember(callerFrom(req.headers), parsed.memberId, parsed.status);
    const response: MemberResponse = { member };
    return reply.code(201).send(response);
  });

  app.get<{ Params: { memberId: string } }>("/registry/members/:memberId", async (req) => {
    const response: MemberResponse = { member: core.registry.getMember(req.params.memberId) };
    return response;
  });

  app.post<{ Params: { memberId: string } }>("/registry/members/:memberId/status", async (req, reply) => {
    const parsed = parseSetMemberStatusRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected status PENDING, ACTIVE, SUSPENDED or TERMINATED",
      });
    }

    const member = core.registry.setMemberStatus(callerFrom(req.headers), req.params.memberId, parsed.status);
    const response: MemberResponse = { member };
    return response;
  });

  app.post("/registry/principals", async (req, reply) => {
    const parsed = parseAssignRolesRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected address, roles and optional memberId",
      });
    }

    const principal = core.registry.assignRoles(
      callerFrom(req.headers),
      parsed.address,
      parsed.memberId ?? null,
      RoleSet.of(...parsed.roles),
    );
    const response: PrincipalResponse = { principal };
    return response;
  });

  app.get<{ Params: { address: string } }>("/registry/principals/:address", async (req) => {
    const response: PrincipalResponse = { principal: core.registry.getPrincipal(req.params.address) };
    return response;
  });

  app.post("/registry/blacklist", async (req, reply) => {
    const parsed = parseSetBlacklistedRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected address, blacklisted and optional reason",
      });
    }

    const principal = core.registry.setBlacklisted(
      callerFrom(req.headers),
      parsed.address,
      parsed.blacklisted,
      parsed.reason ?? "",
    );
    const response: PrincipalResponse = { principal };
    return response;
  });
}
