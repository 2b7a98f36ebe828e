import assert from "node:assert/strict";
import test from "node:test";
import { loadConfig } from "../config.js";

test("defaults apply when the environment is empty", () => {
  const config = loadConfig({});

  assert.equal(config.port, 4110);
  assert.equal(config.host, "0.0.0.0");
  assert.equal(config.dbPath, "data/custody-service.db");
  assert.equal(config.serviceAuthToken, undefined);
  assert.equal(config.bootstrapAdminAddress, undefined);
  assert.deepEqual(config.executionDefaults, { enableOnChainTransfer: true, enableAutoLedgerUpdate: true });
  assert.deepEqual(config.statusOperatorRoles.toArray(), ["CUSTODIAN", "VAULT_OPERATOR", "PLATFORM"]);
  assert.equal(config.logLevel, "info");
});

test("environment values override the defaults", () => {
  const config = loadConfig({
    PORT: "5000",
    CUSTODY_DB_PATH: "/tmp/custody.db",
    SERVICE_AUTH_TOKEN: "  test-secret  ",
    ENABLE_ONCHAIN_TRANSFER: "false",
    ENABLE_AUTO_LEDGER_UPDATE: "0",
    STATUS_OPERATOR_ROLES: "none",
    LOG_LEVEL: "DEBUG",
  });

  assert.equal(config.port, 5000);
  assert.equal(config.dbPath, "/tmp/custody.db");
  assert.equal(config.serviceAuthToken, "test-secret");
  assert.deepEqual(config.executionDefaults, { enableOnChainTransfer: false, enableAutoLedgerUpdate: false });
  assert.equal(config.statusOperatorRoles.isEmpty(), true);
  assert.equal(config.logLevel, "debug");
});

test("malformed values are rejected at startup", () => {
  assert.throws(() => loadConfig({ ENABLE_ONCHAIN_TRANSFER: "maybe" }), /ENABLE_ONCHAIN_TRANSFER must be true or false/);
  assert.throws(() => loadConfig({ LOG_LEVEL: "loud" }), RangeError);
  assert.throws(() => loadConfig({ STATUS_OPERATOR_ROLES: "PLATFORM,KING" }), /Unknown role 'KING'/);
});
