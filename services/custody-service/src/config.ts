import { type ExecutionOptions, parseRoleList, type Role, RoleSet } from "@bullion/shared";

export const DEFAULT_PORT = 4110;
export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_CUSTODY_DB_PATH = "data/custody-service.db";
export const DEFAULT_LOG_LEVEL = "info";
export const DEFAULT_STATUS_OPERATOR_ROLE_NAMES: Role[] = ["PLATFORM", "CUSTODIAN", "VAULT_OPERATOR"];

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CustodyServiceConfig {
  port: number;
  host: string;
  dbPath: string;
  serviceAuthToken?: string;
  bootstrapAdminAddress?: string;
  executionDefaults: ExecutionOptions;
  statusOperatorRoles: RoleSet;
  logLevel: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function parseBooleanFlag(name: string, raw: string | undefined, fallback: boolean): boolean {
  const value = (raw || "").trim().toLowerCase();
  if (!value) return fallback;
  if (value === "true" || value === "1" || value === "yes") return true;
  if (value === "false" || value === "0" || value === "no") return false;
  throw new RangeError(`${name} must be true or false, got '${raw}'`);
}

function optionalString(raw: string | undefined): string | undefined {
  const value = (raw || "").trim();
  return value ? value : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CustodyServiceConfig {
  const logLevel = (env.LOG_LEVEL || DEFAULT_LOG_LEVEL).trim().toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new RangeError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);
  }

  return {
    port: Number(env.PORT || 0) || DEFAULT_PORT,
    host: env.HOST || DEFAULT_HOST,
    dbPath: env.CUSTODY_DB_PATH || DEFAULT_CUSTODY_DB_PATH,
    serviceAuthToken: optionalString(env.SERVICE_AUTH_TOKEN),
    bootstrapAdminAddress: optionalString(env.BOOTSTRAP_ADMIN_ADDRESS),
    executionDefaults: {
      enableOnChainTransfer: parseBooleanFlag("ENABLE_ONCHAIN_TRANSFER", env.ENABLE_ONCHAIN_TRANSFER, true),
      enableAutoLedgerUpdate: parseBooleanFlag("ENABLE_AUTO_LEDGER_UPDATE", env.ENABLE_AUTO_LEDGER_UPDATE, true),
    },
    statusOperatorRoles: parseRoleList(env.STATUS_OPERATOR_ROLES, DEFAULT_STATUS_OPERATOR_ROLE_NAMES),
    logLevel,
  };
}
