import type { MintAssetRequest, PrepareOrderRequest } from "@bullion/shared";
import { RoleSet } from "@bullion/shared";
import { type CustodyCore, type CustodyCoreOptions, createCustodyCore } from "../core.js";
import { IN_MEMORY_DB_PATH } from "../storage/database.js";

export const FIXED_NOW = "2026-03-01T09:00:00.000Z";

// Digit-only addresses are their own checksummed form.
export const ADMIN = `0x${"1".repeat(40)}`;
export const REFINER = `0x${"2".repeat(40)}`;
export const CUSTODIAN = `0x${"3".repeat(40)}`;
export const ALICE = `0x${"4".repeat(40)}`;
export const BOB = `0x${"5".repeat(40)}`;
export const OUTSIDER = `0x${"6".repeat(40)}`;
export const VAULT = `0x${"7".repeat(40)}`;

export const ALICE_MEMBER = "M-ALICE";
export const BOB_MEMBER = "M-BOB";
export const ALICE_ACCOUNT = "IGAN-1000";
export const BOB_ACCOUNT = "IGAN-1001";

export function createTestCore(overrides: Partial<CustodyCoreOptions> = {}): CustodyCore {
  return createCustodyCore({
    dbPath: IN_MEMORY_DB_PATH,
    clock: () => FIXED_NOW,
    bootstrapAdminAddress: ADMIN,
    ...overrides,
  });
}

/**
 * Two active members with one account each (IGAN-1000 for Alice, IGAN-1001
 * for Bob), a refiner and a custodian.
 */
export function seedParticipants(core: CustodyCore): void {
  core.registry.registerMember(ADMIN, ALICE_MEMBER, "ACTIVE");
  core.registry.registerMember(ADMIN, BOB_MEMBER, "ACTIVE");
  core.registry.assignRoles(ADMIN, REFINER, null, RoleSet.of("REFINER"));
  core.registry.assignRoles(ADMIN, CUSTODIAN, null, RoleSet.of("CUSTODIAN"));
  core.registry.assignRoles(ADMIN, ALICE, ALICE_MEMBER, RoleSet.EMPTY);
  core.registry.assignRoles(ADMIN, BOB, BOB_MEMBER, RoleSet.EMPTY);
  core.ledger.createAccount(ADMIN, ALICE_MEMBER, ALICE);
  core.ledger.createAccount(ADMIN, BOB_MEMBER, BOB);
}

export function mintInput(overrides: Partial<MintAssetRequest> = {}): MintAssetRequest {
  return {
    owner: ALICE,
    accountId: ALICE_ACCOUNT,
    serialNumber: "SN-0001",
    refiner: "Test Refinery",
    weightGrams: 1000,
    fineness: 9999,
    productType: "BAR_1KG",
    certificateHash: "cert-hash-1",
    memberId: ALICE_MEMBER,
    certified: true,
    warrantId: "W-1",
    ...overrides,
  };
}

export function orderInput(overrides: Partial<PrepareOrderRequest> = {}): PrepareOrderRequest {
  return {
    externalRef: "EXT-1",
    txRef: "TX-1",
    orderType: "TRANSFER",
    initiatorId: ALICE_MEMBER,
    counterpartyId: BOB_MEMBER,
    sourceAccountId: ALICE_ACCOUNT,
    destAccountId: BOB_ACCOUNT,
    tokenIds: [1],
    requestedAssets: [{ productType: "BAR_1KG", quantity: 1 }],
    settlementDate: "2026-03-02",
    currency: "USD",
    price: "65000.00",
    fee: "12.50",
    ...overrides,
  };
}
