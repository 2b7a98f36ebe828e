import type { FastifyInstance } from "fastify";
import {
  type AssetLockResponse,
  type AssetResponse,
  isAssetStatus,
  type ListAssetsResponse,
  type VerifyCertificateResponse,
} from "@bullion/shared";
import type { CustodyCore } from "../core.js";
import {
  isNonEmptyString,
  parseBurnAssetRequest,
  parseForceTransferAssetRequest,
  parseMintAssetRequest,
  parseTokenIdParam,
  parseTransferAssetRequest,
  parseUpdateAssetStatusRequest,
  parseUpdateCustodyBatchRequest,
  parseVerifyCertificateRequest,
} from "../http/parsers.js";
import { callerFrom } from "../http/request-context.js";

type TokenRoute = { Params: { tokenId: string } };

const INVALID_TOKEN_ID = {
  error: "invalid_token_id",
  message: "tokenId must be a positive integer",
};

export function registerAssetRoutes(app: FastifyInstance, core: CustodyCore): void {
  app.post("/assets/mint", async (req, reply) => {
    const parsed = parseMintAssetRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message:
          "Expected owner, accountId, serialNumber, refiner, weightGrams, fineness, productType, certificateHash, memberId, certified, warrantId",
      });
    }

    const asset = core.custody.mint(callerFrom(req.headers), parsed);
    const response: AssetResponse = { asset };
    return reply.code(201).send(response);
  });

  app.get<{ Querystring: { owner?: string; status?: string } }>("/assets", async (req, reply) => {
    const { owner, status } = req.query;
    if (isNonEmptyString(owner)) {
      const response: ListAssetsResponse = { assets: core.custody.tokensOf(owner) };
      return response;
    }
    if (status !== undefined && !isAssetStatus(status)) {
      return reply.code(400).send({ error: "invalid_status" });
    }
    const response: ListAssetsResponse = { assets: core.custody.listAssets(status) };
    return response;
  });

  app.post("/assets/custody", async (req, reply) => {
    const parsed = parseUpdateCustodyBatchRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected non-empty tokenIds, custodian and method",
      });
    }

    const assets = core.custody.updateCustodyBatch(
      callerFrom(req.headers),
      parsed.tokenIds,
      parsed.custodian,
      parsed.method,
    );
    const response: ListAssetsResponse = { assets };
    return response;
  });

  app.get<TokenRoute>("/assets/:tokenId", async (req, reply) => {
    const tokenId = parseTokenIdParam(req.params.tokenId);
    if (tokenId === null) return reply.code(400).send(INVALID_TOKEN_ID);

    const response: AssetResponse = { asset: core.custody.getAsset(tokenId) };
    return response;
  });

  app.get<TokenRoute>("/assets/:tokenId/locked", async (req, reply) => {
    const tokenId = parseTokenIdParam(req.params.tokenId);
    if (tokenId === null) return reply.code(400).send(INVALID_TOKEN_ID);

    const response: AssetLockResponse = {
      tokenId,
      locked: core.custody.isAssetLocked(tokenId),
      status: core.custody.getAsset(tokenId).status,
    };
    return response;
  });

  app.post<TokenRoute>("/assets/:tokenId/status", async (req, reply) => {
    const tokenId = parseTokenIdParam(req.params.tokenId);
    if (tokenId === null) return reply.code(400).send(INVALID_TOKEN_ID);
    const parsed = parseUpdateAssetStatusRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected status and reason",
      });
    }

    const asset = core.custody.updateStatus(callerFrom(req.headers), tokenId, parsed.status, parsed.reason);
    const response: AssetResponse = { asset };
    return response;
  });

  app.post<TokenRoute>("/assets/:tokenId/burn", async (req, reply) => {
    const tokenId = parseTokenIdParam(req.params.tokenId);
    if (tokenId === null) return reply.code(400).send(INVALID_TOKEN_ID);
    const parsed = parseBurnAssetRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected accountId and reason",
      });
    }

    const asset = core.custody.burn(callerFrom(req.headers), tokenId, parsed.accountId, parsed.reason);
    const response: AssetResponse = { asset };
    return response;
  });

  app.post<TokenRoute>("/assets/:tokenId/transfer", async (req, reply) => {
    const tokenId = parseTokenIdParam(req.params.tokenId);
    if (tokenId === null) return reply.code(400).send(INVALID_TOKEN_ID);
    const parsed = parseTransferAssetRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected from, to and optional quantity",
      });
    }

    const asset = core.custody.transfer(
      callerFrom(req.headers),
      parsed.from,
      parsed.to,
      tokenId,
      parsed.quantity,
    );
    const response: AssetResponse = { asset };
    return response;
  });

  app.post<TokenRoute>("/assets/:tokenId/force-transfer", async (req, reply) => {
    const tokenId = parseTokenIdParam(req.params.tokenId);
    if (tokenId === null) return reply.code(400).send(INVALID_TOKEN_ID);
    const parsed = parseForceTransferAssetRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected from, to and reason",
      });
    }

    const asset = core.custody.forceTransfer(
      callerFrom(req.headers),
      tokenId,
      parsed.from,
      parsed.to,
      parsed.reason,
    );
    const response: AssetResponse = { asset };
    return response;
  });

  app.post<TokenRoute>("/assets/:tokenId/verify-certificate", async (req, reply) => {
    const tokenId = parseTokenIdParam(req.params.tokenId);
    if (tokenId === null) return reply.code(400).send(INVALID_TOKEN_ID);
    const parsed = parseVerifyCertificateRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected certificateHash",
      });
    }

    const response: VerifyCertificateResponse = {
      tokenId,
      valid: core.custody.verifyCertificate(tokenId, parsed.certificateHash),
    };
    return response;
  });
}
