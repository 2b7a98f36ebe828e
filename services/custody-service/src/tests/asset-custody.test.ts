import assert from "node:assert/strict";
import test from "node:test";
import {
  type AssetStatus,
  AuthorizationError,
  ComplianceError,
  DuplicateError,
  InvalidStateError,
  NotFoundError,
  RoleSet,
  ValidationError,
} from "@bullion/shared";
import {
  ADMIN,
  ALICE,
  ALICE_ACCOUNT,
  BOB,
  BOB_ACCOUNT,
  createTestCore,
  CUSTODIAN,
  FIXED_NOW,
  mintInput,
  OUTSIDER,
  REFINER,
  seedParticipants,
  VAULT,
} from "./fixtures.js";

function isInvalidState(code: string) {
  return (err: unknown) => err instanceof InvalidStateError && err.code === code;
}

test("mint stores the token and credits the supplied account once", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    const asset = core.custody.mint(REFINER, mintInput());

    assert.equal(asset.tokenId, 1);
    assert.equal(asset.fineWeightGrams, 999);
    assert.equal(asset.status, "REGISTERED");
    assert.equal(asset.custodian, null);
    assert.equal(asset.accountId, ALICE_ACCOUNT);
    assert.deepEqual(core.custody.getAsset(1), asset);
    assert.equal(core.ledger.getAccountBalance(ALICE_ACCOUNT), 1);

    assert.deepEqual(
      core.events.list({ ref: "token:1" }).map((record) => record.event.type),
      ["AssetMinted", "WarrantLinked"],
    );
    const ledgerEvents = core.events.list({ ref: ALICE_ACCOUNT, type: "BalanceUpdated" });
    assert.deepEqual(ledgerEvents.map((record) => record.event), [
      {
        type: "BalanceUpdated",
        occurredAt: FIXED_NOW,
        actor: "asset-custody",
        accountId: ALICE_ACCOUNT,
        delta: 1,
        balance: 1,
        reason: "MINT",
        refId: "1",
        channel: "CONTRACT",
      },
    ]);
  } finally {
    core.close();
  }
});

test("a reused warrant is rejected and nothing is credited", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    core.custody.mint(REFINER, mintInput());

    assert.throws(
      () => core.custody.mint(REFINER, mintInput({ serialNumber: "SN-0002" })),
      (err: unknown) => err instanceof DuplicateError && err.code === "warrant_already_used",
    );
    assert.equal(core.ledger.getAccountBalance(ALICE_ACCOUNT), 1);
    assert.equal(core.custody.listAssets().length, 1);
  } finally {
    core.close();
  }
});

test("a failed mint leaves no token, credit or consumed warrant", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);

    assert.throws(() => core.custody.mint(ALICE, mintInput()), AuthorizationError);
    assert.throws(() => core.custody.mint(ALICE, mintInput({ weightGrams: 0, owner: "nobody" })), AuthorizationError);
    assert.throws(() => core.custody.mint(REFINER, mintInput({ fineness: 10_001 })), ValidationError);
    assert.throws(() => core.custody.mint(REFINER, mintInput({ weightGrams: 0 })), ValidationError);
    assert.throws(
      () => core.custody.mint(REFINER, mintInput({ accountId: "IGAN-9999" })),
      (err: unknown) => err instanceof NotFoundError && err.code === "account_not_found",
    );
    assert.deepEqual(core.custody.listAssets(), []);
    assert.deepEqual(core.events.list({ ref: "token:1" }), []);

    const asset = core.custody.mint(REFINER, mintInput());
    assert.equal(asset.tokenId, 1);
    assert.equal(asset.warrantId, "W-1");
  } finally {
    core.close();
  }
});

test("isAssetLocked is true exactly for IN_TRANSIT and PLEDGED", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    core.custody.mint(REFINER, mintInput());

    const expected: Array<[AssetStatus, boolean]> = [
      ["IN_VAULT", false],
      ["PLEDGED", true],
      ["REGISTERED", false],
      ["IN_TRANSIT", true],
    ];
    for (const [status, locked] of expected) {
      core.custody.updateStatus(ADMIN, 1, status, "check");
      assert.equal(core.custody.isAssetLocked(1), locked, status);
    }
    assert.throws(() => core.custody.isAssetLocked(99), NotFoundError);
  } finally {
    core.close();
  }
});

test("status rights follow the current owner", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    core.custody.mint(REFINER, mintInput());

    const pledged = core.custody.updateStatus(ALICE, 1, "PLEDGED", "loan collateral");
    assert.equal(pledged.statusReason, "loan collateral");
    assert.throws(() => core.custody.updateStatus(BOB, 1, "IN_VAULT", "mine now"), AuthorizationError);

    core.custody.updateStatus(ALICE, 1, "IN_VAULT", "released");
    core.custody.transfer(ALICE, ALICE, BOB, 1, 1);
    assert.throws(() => core.custody.updateStatus(ALICE, 1, "PLEDGED", "stale owner"), AuthorizationError);
    assert.equal(core.custody.updateStatus(BOB, 1, "PLEDGED", "new owner").status, "PLEDGED");

    const statusEvents = core.events.list({ ref: "token:1", type: "StatusChanged" });
    assert.deepEqual(statusEvents[0]?.event, {
      type: "StatusChanged",
      occurredAt: FIXED_NOW,
      actor: ALICE,
      tokenId: 1,
      previousStatus: "REGISTERED",
      status: "PLEDGED",
      reason: "loan collateral",
    });
  } finally {
    core.close();
  }
});

test("status updates cannot burn, and an empty operator set means owner only", () => {
  const core = createTestCore({ statusOperatorRoles: RoleSet.EMPTY });
  try {
    seedParticipants(core);
    core.custody.mint(REFINER, mintInput());

    assert.throws(() => core.custody.updateStatus(ADMIN, 1, "IN_VAULT", "ops"), AuthorizationError);
    assert.throws(() => core.custody.updateStatus(ALICE, 1, "BURNED", "gone"), isInvalidState("invalid_status"));
    assert.equal(core.custody.updateStatus(ALICE, 1, "IN_VAULT", "deposited").status, "IN_VAULT");
    assert.throws(() => core.custody.updateStatus(ALICE, 99, "IN_VAULT", "x"), NotFoundError);
  } finally {
    core.close();
  }
});

test("updateCustodyBatch moves every token IN_TRANSIT or none", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    core.custody.mint(REFINER, mintInput());
    core.custody.mint(REFINER, mintInput({ warrantId: "W-2", serialNumber: "SN-0002" }));

    assert.throws(() => core.custody.updateCustodyBatch(CUSTODIAN, [1, 99], VAULT, "ARMORED_CAR"), NotFoundError);
    assert.equal(core.custody.getAsset(1).status, "REGISTERED");
    assert.equal(core.custody.getAsset(1).custodian, null);
    assert.throws(() => core.custody.updateCustodyBatch(ADMIN, [1], VAULT, "ARMORED_CAR"), AuthorizationError);
    assert.throws(() => core.custody.updateCustodyBatch(ADMIN, [], "nowhere", "ARMORED_CAR"), AuthorizationError);
    assert.throws(() => core.custody.updateCustodyBatch(CUSTODIAN, [], VAULT, "ARMORED_CAR"), ValidationError);

    const moved = core.custody.updateCustodyBatch(CUSTODIAN, [1, 2], VAULT, "ARMORED_CAR");
    assert.deepEqual(
      moved.map((asset) => [asset.tokenId, asset.status, asset.custodian]),
      [
        [1, "IN_TRANSIT", VAULT],
        [2, "IN_TRANSIT", VAULT],
      ],
    );
    assert.deepEqual(core.events.list({ ref: "token:2", type: "CustodyChanged" })[0]?.event, {
      type: "CustodyChanged",
      occurredAt: FIXED_NOW,
      actor: CUSTODIAN,
      tokenId: 2,
      previousCustodian: null,
      custodian: VAULT,
      method: "ARMORED_CAR",
    });
  } finally {
    core.close();
  }
});

test("burn debits the mint account whatever account id is passed", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    core.custody.mint(REFINER, mintInput());
    core.ledger.updateBalance(ADMIN, { accountId: BOB_ACCOUNT, delta: 5, reason: "seed", refId: "S-1" });

    assert.throws(() => core.custody.burn(ALICE, 1, ALICE_ACCOUNT, "melt"), AuthorizationError);
    const burned = core.custody.burn(REFINER, 1, BOB_ACCOUNT, "melt");

    assert.equal(burned.status, "BURNED");
    assert.equal(core.ledger.getAccountBalance(ALICE_ACCOUNT), 0);
    assert.equal(core.ledger.getAccountBalance(BOB_ACCOUNT), 5);
    assert.deepEqual(core.events.list({ ref: "token:1", type: "AssetBurned" })[0]?.event, {
      type: "AssetBurned",
      occurredAt: FIXED_NOW,
      actor: REFINER,
      tokenId: 1,
      owner: ALICE,
      accountId: ALICE_ACCOUNT,
      requestedAccountId: BOB_ACCOUNT,
      reason: "melt",
    });

    assert.throws(() => core.custody.burn(REFINER, 1, ALICE_ACCOUNT, "again"), isInvalidState("asset_burned"));
    assert.throws(() => core.custody.transfer(ALICE, ALICE, BOB, 1, 1), isInvalidState("asset_burned"));
    assert.throws(() => core.custody.burn(REFINER, 99, ALICE_ACCOUNT, "melt"), NotFoundError);
    assert.deepEqual(core.custody.tokensOf(ALICE), []);
    assert.equal(core.custody.listAssets("BURNED").length, 1);
  } finally {
    core.close();
  }
});

test("transfer moves ownership only for the owner and only while unlocked", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    core.custody.mint(REFINER, mintInput());

    assert.throws(() => core.custody.transfer(BOB, ALICE, BOB, 1, 1), AuthorizationError);
    assert.throws(() => core.custody.transfer(BOB, BOB, ALICE, 1, 1), AuthorizationError);
    assert.throws(() => core.custody.transfer(ALICE, ALICE, BOB, 1, 2), ValidationError);

    core.custody.updateStatus(ALICE, 1, "PLEDGED", "collateral");
    assert.throws(() => core.custody.transfer(ALICE, ALICE, BOB, 1, 1), isInvalidState("asset_locked"));
    assert.throws(() => core.custody.forceTransfer(ADMIN, 1, ALICE, BOB, "COURT_ORDER"), isInvalidState("asset_locked"));
    assert.equal(core.custody.getAsset(1).owner, ALICE);

    core.custody.updateStatus(ALICE, 1, "IN_VAULT", "released");
    const moved = core.custody.transfer(ALICE, ALICE, BOB, 1, 1);
    assert.equal(moved.owner, BOB);
    assert.deepEqual(core.custody.tokensOf(BOB).map((asset) => asset.tokenId), [1]);
    assert.deepEqual(core.custody.tokensOf(ALICE), []);
    assert.deepEqual(core.events.list({ ref: "token:1", type: "OwnershipUpdated" })[0]?.event, {
      type: "OwnershipUpdated",
      occurredAt: FIXED_NOW,
      actor: ALICE,
      tokenId: 1,
      from: ALICE,
      to: BOB,
      reason: "TRANSFER",
    });
  } finally {
    core.close();
  }
});

test("blacklisted parties block transfer but not a forced transfer", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    core.custody.mint(REFINER, mintInput());
    core.registry.setBlacklisted(ADMIN, BOB, true, "sanctions");

    assert.throws(
      () => core.custody.transfer(ALICE, ALICE, BOB, 1, 1),
      (err: unknown) => err instanceof ComplianceError && err.address === BOB,
    );
    assert.throws(() => core.custody.forceTransfer(ALICE, 1, ALICE, BOB, "COURT_ORDER"), AuthorizationError);
    assert.throws(() => core.custody.forceTransfer(ADMIN, 1, OUTSIDER, BOB, "COURT_ORDER"), ValidationError);

    const forced = core.custody.forceTransfer(ADMIN, 1, ALICE, BOB, "COURT_ORDER");
    assert.equal(forced.owner, BOB);
    const ownership = core.events.list({ ref: "token:1", type: "OwnershipUpdated" });
    assert.deepEqual(ownership.map((record) => record.event.actor), [ADMIN]);

    core.registry.setBlacklisted(ADMIN, BOB, false, "cleared");
    core.registry.setBlacklisted(ADMIN, ALICE, true, "sanctions");
    assert.throws(() => core.custody.transfer(BOB, BOB, ALICE, 1, 1), ComplianceError);
  } finally {
    core.close();
  }
});

test("verifyCertificate compares against the stored hash", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    core.custody.mint(REFINER, mintInput());

    assert.equal(core.custody.verifyCertificate(1, "cert-hash-1"), true);
    assert.equal(core.custody.verifyCertificate(1, "cert-hash-2"), false);
    assert.throws(() => core.custody.verifyCertificate(2, "cert-hash-1"), NotFoundError);
  } finally {
    core.close();
  }
});

test("settle only honours capabilities issued by custody", () => {
  const core = createTestCore();
  try {
    seedParticipants(core);
    core.custody.mint(REFINER, mintInput());

    assert.throws(() => core.custody.settle({ holder: "order-settlement" }, 1, BOB, "TX-X"), AuthorizationError);
    assert.equal(core.custody.getAsset(1).owner, ALICE);
  } finally {
    core.close();
  }
});
