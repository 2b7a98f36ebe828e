import Fastify from "fastify";
import {
  type ErrorResponse,
  type ExecutionOptions,
  isDomainError,
  isServiceAuthAuthorized,
  type RoleSet,
  SERVICE_AUTH_HEADER,
} from "@bullion/shared";
import type { Clock } from "./clock.js";
import { type LogLevel, loadConfig } from "./config.js";
import { createCustodyCore, type CustodyCore } from "./core.js";
import { DOMAIN_ERROR_STATUS } from "./http/request-context.js";
import { buildOpenApiSpec } from "./openapi.js";
import { registerAssetRoutes } from "./routes/asset-routes.js";
import { registerEventRoutes } from "./routes/event-routes.js";
import { registerLedgerRoutes } from "./routes/ledger-routes.js";
import { registerOrderRoutes } from "./routes/order-routes.js";
import { registerRegistryRoutes } from "./routes/registry-routes.js";

export interface BuildServerOptions {
  core?: CustodyCore;
  dbPath?: string;
  serviceAuthToken?: string;
  bootstrapAdminAddress?: string;
  executionDefaults?: ExecutionOptions;
  statusOperatorRoles?: RoleSet;
  logLevel?: LogLevel;
  clock?: Clock;
  serviceBaseUrl?: string;
  env?: NodeJS.ProcessEnv;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = loadConfig(options.env ?? process.env);
  const app = Fastify({ logger: { level: options.logLevel ?? config.logLevel } });

  const core =
    options.core ||
    createCustodyCore({
      dbPath: options.dbPath || config.dbPath,
      clock: options.clock,
      logger: app.log,
      executionDefaults: options.executionDefaults ?? config.executionDefaults,
      statusOperatorRoles: options.statusOperatorRoles ?? config.statusOperatorRoles,
      bootstrapAdminAddress: options.bootstrapAdminAddress ?? config.bootstrapAdminAddress,
    });
  const ownCore = !options.core;
  const serviceAuthToken = options.serviceAuthToken ?? config.serviceAuthToken;
  const serviceBaseUrl = options.serviceBaseUrl || `http://127.0.0.1:${config.port}`;

  app.addHook("preHandler", async (req, reply) => {
    if (req.method !== "POST") return;
    if (isServiceAuthAuthorized(req.headers[SERVICE_AUTH_HEADER], serviceAuthToken)) return;
    reply.code(401).send({
      error: "unauthorized_service",
      message: `Missing or invalid '${SERVICE_AUTH_HEADER}' header`,
    });
    return reply;
  });

  app.setErrorHandler((error, req, reply) => {
    if (isDomainError(error)) {
      req.log.info({ code: error.code, kind: error.kind }, error.message);
      const response: ErrorResponse = { error: error.code, message: error.message };
      return reply.code(DOMAIN_ERROR_STATUS[error.kind]).send(response);
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      const response: ErrorResponse = { error: "invalid_request", message: error.message };
      return reply.code(error.statusCode).send(response);
    }
    req.log.error({ err: error }, "unhandled error");
    const response: ErrorResponse = { error: "internal_error", message: "Internal server error" };
    return reply.code(500).send(response);
  });

  app.get("/health", async () => ({ ok: true, service: "custody-service" }));
  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));

  registerRegistryRoutes(app, core);
  registerLedgerRoutes(app, core);
  registerAssetRoutes(app, core);
  registerOrderRoutes(app, core);
  registerEventRoutes(app, core);

  app.addHook("onClose", async () => {
    if (ownCore) {
      core.close();
    }
  });

  return app;
}
