import { describe, it, expect } from "vitest";
import { isLedgerError } from "../src/errors";
import { MAX_UINT256, UNIT } from "../src/core/math";
import { ALICE, CHAIN_1, CHAIN_2, LEDGER_1, LEDGER_2, OWNER } from "./helpers/accounts";
import { catchError, makeNetwork, recordEvents } from "./helpers/ledger";

const HALF_UP = (UNIT * 3n) / 2n;

const secondary = () =>
  makeNetwork([
    { chainId: CHAIN_1, address: LEDGER_1 },
    { chainId: CHAIN_2, address: LEDGER_2 },
  ]).chain(CHAIN_2);

describe("sequenced index updates", () => {
  it("rescales balances on the main chain", () => {
    const main = makeNetwork([{ chainId: CHAIN_1, address: LEDGER_1 }]).chain(CHAIN_1);
    main.mint(OWNER, ALICE, 1000n);
    expect(main.sharesOf(ALICE)).toBe(1000n);

    main.syncRebaseIndex(OWNER, HALF_UP, 1n);
    expect(main.balanceOf(ALICE)).toBe(1500n);
    expect(main.totalSupply()).toBe(1500n);
  });

  it("applies an update with a newer sequence number", () => {
    const t = secondary();
    expect(t.sequenceNumber()).toBe(0n);
    expect(t.syncRebaseIndex(OWNER, HALF_UP, 1n)).toBe(true);
    expect(t.rebaseIndex()).toBe(HALF_UP);
    expect(t.sequenceNumber()).toBe(1n);
  });

  it("ignores a stale update", () => {
    const t = secondary();
    t.syncRebaseIndex(OWNER, HALF_UP, 5n);
    expect(t.syncRebaseIndex(OWNER, 2n * UNIT, 4n)).toBe(false);
    expect(t.rebaseIndex()).toBe(HALF_UP);
    expect(t.sequenceNumber()).toBe(5n);
  });

  it("accepts an update at the stored sequence number", () => {
    const t = secondary();
    t.syncRebaseIndex(OWNER, HALF_UP, 1n);
    expect(t.syncRebaseIndex(OWNER, 2n * UNIT, 1n)).toBe(true);
    expect(t.rebaseIndex()).toBe(2n * UNIT);
    expect(t.sequenceNumber()).toBe(1n);
  });

  it("announces a repeated update only once", () => {
    const t = secondary();
    const events = recordEvents(t);
    t.syncRebaseIndex(OWNER, HALF_UP, 1n);
    t.syncRebaseIndex(OWNER, HALF_UP, 1n);
    expect(events).toEqual([{ type: "RebaseIndexUpdated", updater: OWNER, rebaseIndex: HALF_UP }]);
  });

  it("rejects the unsequenced setter once synchronized", () => {
    const t = secondary();
    const err = catchError(() => t.setRebaseIndex(OWNER, HALF_UP));
    expect(isLedgerError(err, "InvalidRebaseIndexMutator")).toBe(true);
    expect(t.rebaseIndex()).toBe(UNIT);
  });

  it("keeps the sequence number when the index overflows", () => {
    const t = secondary();
    t.mint(OWNER, ALICE, MAX_UINT256 / 2n);
    const err = catchError(() => t.syncRebaseIndex(OWNER, 3n * UNIT, 4n));
    expect(isLedgerError(err, "RebaseOverflow")).toBe(true);
    expect(t.rebaseIndex()).toBe(UNIT);
    expect(t.sequenceNumber()).toBe(0n);
  });

  it("is reserved for the owner", () => {
    const t = secondary();
    expect(isLedgerError(catchError(() => t.syncRebaseIndex(ALICE, HALF_UP, 1n)), "NotOwner")).toBe(true);
  });
});
