import assert from "node:assert/strict";
import test from "node:test";
import {
  AuthorizationError,
  InsufficientBalanceError,
  MemberNotActiveError,
  NotFoundError,
  ValidationError,
} from "@bullion/shared";
import {
  ADMIN,
  ALICE,
  ALICE_ACCOUNT,
  ALICE_MEMBER,
  BOB_ACCOUNT,
  BOB_MEMBER,
  createTestCore,
  CUSTODIAN,
  FIXED_NOW,
  OUTSIDER,
  seedParticipants,
  VAULT,
} from "./fixtures.js";

test("allocates IGAN ids from 1000 and indexes accounts by member and address", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    const second = core.ledger.createAccount(ADMIN, ALICE_MEMBER, ALICE);

    assert.equal(second.accountId, "IGAN-1002");
    assert.equal(second.balance, 0);
    assert.equal(second.createdAt, FIXED_NOW);
    assert.deepEqual(
      core.ledger.getAccountsByMember(ALICE_MEMBER).map((account) => account.accountId),
      [ALICE_ACCOUNT, "IGAN-1002"],
    );
    assert.deepEqual(
      core.ledger.getAccountsByMember(BOB_MEMBER).map((account) => account.accountId),
      [BOB_ACCOUNT],
    );
    assert.deepEqual(
      core.ledger.getAccountsByAddress(ALICE).map((account) => account.accountId),
      [ALICE_ACCOUNT, "IGAN-1002"],
    );
    assert.deepEqual(core.ledger.getAccountsByAddress(OUTSIDER), []);
    assert.deepEqual(core.ledger.getAccountsByAddress("not-an-address"), []);
  } finally {
    core.close();
  }
});

test("createAccount requires PLATFORM and an ACTIVE member", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    core.registry.registerMember(ADMIN, "M-PENDING");

    assert.throws(() => core.ledger.createAccount(ADMIN, "M-PENDING", OUTSIDER), MemberNotActiveError);
    assert.throws(() => core.ledger.createAccount(ADMIN, "M-UNKNOWN", OUTSIDER), MemberNotActiveError);
    assert.throws(() => core.ledger.createAccount(ALICE, ALICE_MEMBER, ALICE), AuthorizationError);
    assert.deepEqual(core.ledger.getAccountsByAddress(OUTSIDER), []);
  } finally {
    core.close();
  }
});

test("operator updates never drive a balance negative", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);

    const credited = core.ledger.updateBalance(ADMIN, {
      accountId: ALICE_ACCOUNT,
      delta: 10,
      reason: "mint",
      refId: "1",
    });
    assert.equal(credited.balance, 10);
    assert.equal(credited.lastReason, "mint");
    assert.equal(credited.lastRefId, "1");

    assert.throws(
      () => core.ledger.updateBalance(ADMIN, { accountId: ALICE_ACCOUNT, delta: -15, reason: "redeem", refId: "2" }),
      (err: unknown) => err instanceof InsufficientBalanceError && err.balance === 10 && err.delta === -15,
    );
    assert.equal(core.ledger.getAccountBalance(ALICE_ACCOUNT), 10);

    const corrected = core.ledger.updateBalance(CUSTODIAN, {
      accountId: ALICE_ACCOUNT,
      delta: -3,
      reason: "audit correction",
      refId: "AUD-1",
    });
    assert.equal(corrected.balance, 7);
    assert.equal(core.ledger.getAccount(ALICE_ACCOUNT).lastRefId, "AUD-1");
  } finally {
    core.close();
  }
});

test("updateBalance rejects unknown accounts, fractional deltas and outsiders", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);

    assert.throws(
      () => core.ledger.updateBalance(ADMIN, { accountId: "IGAN-9999", delta: 1, reason: "x", refId: "1" }),
      (err: unknown) => err instanceof NotFoundError && err.code === "account_not_found",
    );
    assert.throws(
      () => core.ledger.updateBalance(ADMIN, { accountId: ALICE_ACCOUNT, delta: 1.5, reason: "x", refId: "1" }),
      ValidationError,
    );
    assert.throws(
      () => core.ledger.updateBalance(OUTSIDER, { accountId: ALICE_ACCOUNT, delta: 1, reason: "x", refId: "1" }),
      AuthorizationError,
    );
    assert.throws(() => core.ledger.getAccountBalance("IGAN-9999"), NotFoundError);
  } finally {
    core.close();
  }
});

test("a failed update leaves no audit event behind", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    const before = core.events.list({ ref: ALICE_ACCOUNT }).length;

    assert.throws(
      () => core.ledger.updateBalance(ADMIN, { accountId: ALICE_ACCOUNT, delta: -1, reason: "x", refId: "1" }),
      InsufficientBalanceError,
    );
    assert.equal(core.events.list({ ref: ALICE_ACCOUNT }).length, before);
  } finally {
    core.close();
  }
});

test("contract writes need an issued capability whose holder is still allowlisted", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);

    assert.throws(
      () =>
        core.ledger.updateBalanceFromContract(
          { holder: "asset-custody" },
          { accountId: ALICE_ACCOUNT, delta: 1, reason: "MINT", refId: "1" },
        ),
      AuthorizationError,
    );

    const capability = core.ledger.issueWriteCapability("reconciler");
    assert.deepEqual(core.ledger.listBalanceUpdaters(), ["asset-custody", "order-settlement", "reconciler"]);

    const account = core.ledger.updateBalanceFromContract(capability, {
      accountId: ALICE_ACCOUNT,
      delta: 2,
      reason: "REBATE",
      refId: "R-1",
    });
    assert.equal(account.balance, 2);
    const events = core.events.list({ ref: ALICE_ACCOUNT });
    assert.deepEqual(events[events.length - 1]?.event, {
      type: "BalanceUpdated",
      occurredAt: FIXED_NOW,
      actor: "reconciler",
      accountId: ALICE_ACCOUNT,
      delta: 2,
      balance: 2,
      reason: "REBATE",
      refId: "R-1",
      channel: "CONTRACT",
    });

    core.ledger.setBalanceUpdater(ADMIN, "reconciler", false);
    assert.deepEqual(core.ledger.listBalanceUpdaters(), ["asset-custody", "order-settlement"]);
    const update = { accountId: ALICE_ACCOUNT, delta: 1, reason: "REBATE", refId: "R-2" };
    assert.throws(() => core.ledger.updateBalanceFromContract(capability, update), AuthorizationError);

    // A revoked holder is not re-enabled by asking for a new capability.
    const reissued = core.ledger.issueWriteCapability("reconciler");
    assert.throws(() => core.ledger.updateBalanceFromContract(reissued, update), AuthorizationError);
    assert.equal(core.ledger.getAccountBalance(ALICE_ACCOUNT), 2);
  } finally {
    core.close();
  }
});

test("setBalanceUpdater is PLATFORM-only and takes addresses or module names", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);

    core.ledger.setBalanceUpdater(ADMIN, VAULT, true);
    assert.deepEqual(core.ledger.listBalanceUpdaters(), [VAULT, "asset-custody", "order-settlement"]);

    assert.throws(() => core.ledger.setBalanceUpdater(ALICE, VAULT, false), AuthorizationError);
    assert.throws(() => core.ledger.setBalanceUpdater(ADMIN, "Not Valid", true), ValidationError);

    const events = core.events.list({ ref: VAULT, type: "BalanceUpdaterSet" });
    assert.equal(events.length, 1);
    assert.deepEqual(events[0]?.event, {
      type: "BalanceUpdaterSet",
      occurredAt: FIXED_NOW,
      actor: ADMIN,
      updater: VAULT,
      enabled: true,
    });
  } finally {
    core.close();
  }
});
