import assert from "node:assert/strict";
import test from "node:test";
import { buildServiceAuthHeaders } from "@bullion/shared";
import { buildServer, type BuildServerOptions } from "../server.js";
import { IN_MEMORY_DB_PATH } from "../storage/database.js";
import {
  ADMIN,
  ALICE,
  ALICE_ACCOUNT,
  BOB,
  BOB_ACCOUNT,
  FIXED_NOW,
  mintInput,
  orderInput,
  REFINER,
} from "./fixtures.js";

function buildTestServer(options: BuildServerOptions = {}) {
  return buildServer({
    dbPath: IN_MEMORY_DB_PATH,
    bootstrapAdminAddress: ADMIN,
    clock: () => FIXED_NOW,
    logLevel: "silent",
    env: {},
    ...options,
  });
}

function as(caller: string) {
  return buildServiceAuthHeaders(undefined, caller);
}

test("serves health and the OpenAPI document", async () => {
  const app = await buildTestServer();
  try {
    const health = await app.inject({ method: "GET", url: "/health" });
    assert.equal(health.statusCode, 200);
    assert.deepEqual(health.json(), { ok: true, service: "custody-service" });

    const res = await app.inject({ method: "GET", url: "/openapi.json" });
    assert.equal(res.statusCode, 200);
    const body = res.json<{ openapi: string; paths: Record<string, Record<string, unknown>> }>();
    assert.equal(body.openapi, "3.0.3");
    assert.deepEqual(Object.keys(body.paths["/assets/{tokenId}/transfer"] ?? {}), ["post"]);
  } finally {
    await app.close();
  }
});

test("settles a pledged bar end to end over HTTP", async () => {
  const app = await buildTestServer();
  try {
    for (const memberId of ["M-ALICE", "M-BOB"]) {
      const res = await app.inject({
        method: "POST",
        url: "/registry/members",
        headers: as(ADMIN),
        payload: { memberId, status: "ACTIVE" },
      });
      assert.equal(res.statusCode, 201);
    }
    const principals = [
      { address: REFINER, roles: ["REFINER"] },
      { address: ALICE, memberId: "M-ALICE", roles: [] },
      { address: BOB, memberId: "M-BOB", roles: [] },
    ];
    for (const payload of principals) {
      const res = await app.inject({ method: "POST", url: "/registry/principals", headers: as(ADMIN), payload });
      assert.equal(res.statusCode, 200);
    }

    const aliceAccount = await app.inject({
      method: "POST",
      url: "/accounts",
      headers: as(ADMIN),
      payload: { memberId: "M-ALICE", address: ALICE },
    });
    assert.equal(aliceAccount.statusCode, 201);
    assert.equal(aliceAccount.json<{ account: { accountId: string } }>().account.accountId, ALICE_ACCOUNT);
    const bobAccount = await app.inject({
      method: "POST",
      url: "/accounts",
      headers: as(ADMIN),
      payload: { memberId: "M-BOB", address: BOB },
    });
    assert.equal(bobAccount.json<{ account: { accountId: string } }>().account.accountId, BOB_ACCOUNT);

    const mint = await app.inject({ method: "POST", url: "/assets/mint", headers: as(REFINER), payload: mintInput() });
    assert.equal(mint.statusCode, 201);
    const minted = mint.json<{ asset: { tokenId: number; fineWeightGrams: number } }>();
    assert.equal(minted.asset.tokenId, 1);
    assert.equal(minted.asset.fineWeightGrams, 999);

    const balance = await app.inject({ method: "GET", url: `/accounts/${ALICE_ACCOUNT}/balance` });
    assert.deepEqual(balance.json(), { accountId: ALICE_ACCOUNT, balance: 1 });

    const pledge = await app.inject({
      method: "POST",
      url: "/assets/1/status",
      headers: as(ALICE),
      payload: { status: "PLEDGED", reason: "collateral" },
    });
    assert.equal(pledge.statusCode, 200);
    const locked = await app.inject({ method: "GET", url: "/assets/1/locked" });
    assert.deepEqual(locked.json(), { tokenId: 1, locked: true, status: "PLEDGED" });

    const transfer = await app.inject({
      method: "POST",
      url: "/assets/1/transfer",
      headers: as(ALICE),
      payload: { from: ALICE, to: BOB },
    });
    assert.equal(transfer.statusCode, 409);
    assert.equal(transfer.json<{ error: string }>().error, "asset_locked");

    const prepare = await app.inject({
      method: "POST",
      url: "/orders/prepare",
      headers: as(ALICE),
      payload: orderInput(),
    });
    assert.equal(prepare.statusCode, 201);
    const sign = await app.inject({
      method: "POST",
      url: "/orders/TX-1/sign",
      headers: as(BOB),
      payload: { signature: "0xdeadbeef", partyLabel: "BUYER" },
    });
    assert.equal(sign.json<{ order: { status: string } }>().order.status, "PENDING_EXECUTION");

    const execute = await app.inject({ method: "POST", url: "/orders/TX-1/execute", headers: as(ADMIN) });
    assert.equal(execute.statusCode, 200);
    assert.equal(execute.json<{ order: { status: string } }>().order.status, "EXECUTED");

    const aliceBalance = await app.inject({ method: "GET", url: `/accounts/${ALICE_ACCOUNT}/balance` });
    assert.deepEqual(aliceBalance.json(), { accountId: ALICE_ACCOUNT, balance: 0 });
    const bobBalance = await app.inject({ method: "GET", url: `/accounts/${BOB_ACCOUNT}/balance` });
    assert.deepEqual(bobBalance.json(), { accountId: BOB_ACCOUNT, balance: 1 });

    const asset = await app.inject({ method: "GET", url: "/assets/1" });
    const settled = asset.json<{ asset: { owner: string; status: string } }>();
    assert.equal(settled.asset.owner, BOB);
    assert.equal(settled.asset.status, "IN_VAULT");

    const replay = await app.inject({ method: "POST", url: "/orders/TX-1/execute", headers: as(ADMIN) });
    assert.equal(replay.statusCode, 409);
    assert.equal(replay.json<{ error: string }>().error, "invalid_order_state");

    const verify = await app.inject({ method: "GET", url: "/events/verify" });
    assert.equal(verify.json<{ valid: boolean }>().valid, true);

    const orderEvents = await app.inject({ method: "GET", url: "/events?ref=TX-1" });
    const listed = orderEvents.json<{ events: Array<{ event: { type: string } }> }>();
    assert.deepEqual(
      listed.events.map((record) => record.event.type),
      ["OrderCreated", "OrderPrepared", "OrderSigned", "OrderExecuted"],
    );
  } finally {
    await app.close();
  }
});

test("maps domain errors to status codes", async () => {
  const app = await buildTestServer();
  try {
    const missingCaller = await app.inject({
      method: "POST",
      url: "/registry/members",
      payload: { memberId: "M-1" },
    });
    assert.equal(missingCaller.statusCode, 403);
    assert.equal(missingCaller.json<{ error: string }>().error, "unauthorized");

    const badCaller = await app.inject({
      method: "POST",
      url: "/registry/members",
      headers: as("not-an-address"),
      payload: { memberId: "M-1" },
    });
    assert.equal(badCaller.statusCode, 400);

    const invalid = await app.inject({
      method: "POST",
      url: "/accounts",
      headers: as(ADMIN),
      payload: { memberId: "M-1" },
    });
    assert.equal(invalid.statusCode, 400);
    assert.equal(invalid.json<{ error: string }>().error, "invalid_request");

    const inactive = await app.inject({
      method: "POST",
      url: "/accounts",
      headers: as(ADMIN),
      payload: { memberId: "M-1", address: ALICE },
    });
    assert.equal(inactive.statusCode, 403);
    assert.equal(inactive.json<{ error: string }>().error, "member_not_active");

    const missing = await app.inject({ method: "GET", url: "/accounts/IGAN-9999" });
    assert.equal(missing.statusCode, 404);
    assert.deepEqual(missing.json(), { error: "account_not_found", message: "account 'IGAN-9999' not found" });

    await app.inject({ method: "POST", url: "/registry/members", headers: as(ADMIN), payload: { memberId: "M-1" } });
    const duplicate = await app.inject({
      method: "POST",
      url: "/registry/members",
      headers: as(ADMIN),
      payload: { memberId: "M-1" },
    });
    assert.equal(duplicate.statusCode, 409);
    assert.equal(duplicate.json<{ error: string }>().error, "member_exists");

    const badToken = await app.inject({ method: "GET", url: "/assets/abc" });
    assert.equal(badToken.statusCode, 400);
    assert.equal(badToken.json<{ error: string }>().error, "invalid_token_id");

    const badType = await app.inject({ method: "GET", url: "/events?type=Bogus" });
    assert.equal(badType.statusCode, 400);
  } finally {
    await app.close();
  }
});

test("requires the service token on mutations when one is configured", async () => {
  const app = await buildTestServer({ serviceAuthToken: "test-secret" });
  try {
    const denied = await app.inject({
      method: "POST",
      url: "/registry/members",
      headers: as(ADMIN),
      payload: { memberId: "M-1" },
    });
    assert.equal(denied.statusCode, 401);
    assert.equal(denied.json<{ error: string }>().error, "unauthorized_service");

    const accepted = await app.inject({
      method: "POST",
      url: "/registry/members",
      headers: buildServiceAuthHeaders("test-secret", ADMIN),
      payload: { memberId: "M-1" },
    });
    assert.equal(accepted.statusCode, 201);

    const read = await app.inject({ method: "GET", url: "/registry/members/M-1" });
    assert.equal(read.statusCode, 200);
    assert.equal(read.json<{ member: { status: string } }>().member.status, "PENDING");
  } finally {
    await app.close();
  }
});
