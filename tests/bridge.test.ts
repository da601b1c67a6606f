import { describe, it, expect, vi } from "vitest";
import { decodeRebasePacket } from "../src/codec/packet";
import { DEAD_ADDRESS } from "../src/core/bridge";
import { UNIT } from "../src/core/math";
import { isLedgerError } from "../src/errors";
import { asDeliverySeq } from "../src/types/brands";
import { ZERO_ADDRESS } from "../src/utils/bytes";
import {
  ALICE,
  BOB,
  CAROL,
  CHAIN_1,
  CHAIN_2,
  CHAIN_3,
  DAVE,
  LEDGER_1,
  LEDGER_2,
  OWNER,
} from "./helpers/accounts";
import { catchError, makeNetwork, recordEvents } from "./helpers/ledger";

const twoChains = () => {
  const net = makeNetwork([
    { chainId: CHAIN_1, address: LEDGER_1 },
    { chainId: CHAIN_2, address: LEDGER_2 },
  ]);
  return { ...net, main: net.chain(CHAIN_1), side: net.chain(CHAIN_2) };
};

describe("main to secondary", () => {
  it("carries shares, index and sequence number", () => {
    const { endpoint, main, side } = twoChains();
    main.mint(OWNER, ALICE, 1000n);
    main.syncRebaseIndex(OWNER, 2n * UNIT, 5n);
    side.syncRebaseIndex(OWNER, UNIT, 3n);
    expect(side.sequenceNumber()).toBe(3n);
    const send = vi.spyOn(endpoint, "send");

    expect(main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 500n)).toBe(250n);

    expect(send).toHaveBeenCalledTimes(1);
    const [src, dst, path, payload] = send.mock.calls[0];
    expect(src).toEqual({ chainId: CHAIN_1, address: LEDGER_1 });
    expect(dst).toBe(CHAIN_2);
    expect(path).toBe(`${LEDGER_2}${LEDGER_1.slice(2)}`);
    expect(decodeRebasePacket(payload)).toEqual({
      to: BOB,
      shares: 250n,
      rebaseIndex: 2n * UNIT,
      sequenceNumber: 5n,
    });

    expect(endpoint.flush()).toBe(1);
    expect(side.state()).toEqual({ rebaseIndex: 2n * UNIT, totalShares: 250n, sequenceNumber: 5n });
    expect(side.sharesOf(BOB)).toBe(250n);
    expect(side.balanceOf(BOB)).toBe(500n);
    expect(side.totalSupply()).toBe(500n);
  });

  it("holds debited tokens in custody on the main chain", () => {
    const { endpoint, main } = twoChains();
    main.mint(OWNER, ALICE, 1000n);
    main.syncRebaseIndex(OWNER, 2n * UNIT, 5n);
    main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 500n);
    endpoint.flush();

    expect(main.balanceOf(ALICE)).toBe(1500n);
    expect(main.sharesOf(ALICE)).toBe(750n);
    expect(main.balanceOf(LEDGER_1)).toBe(500n);
    expect(main.totalSupply()).toBe(2000n);
    expect(main.circulatingSupply()).toBe(1500n);
  });

  it("reports both ends in token units", () => {
    const { endpoint, main, side } = twoChains();
    main.mint(OWNER, ALICE, 1000n);
    const sent = recordEvents(main);
    const received = recordEvents(side);

    main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 400n);
    endpoint.flush();

    expect(sent).toEqual([
      { type: "Transfer", from: ALICE, to: LEDGER_1, amount: 400n },
      { type: "SendToChain", dstChainId: CHAIN_2, from: ALICE, to: BOB, amount: 400n },
    ]);
    expect(received).toEqual([
      { type: "Transfer", from: ZERO_ADDRESS, to: BOB, amount: 400n },
      { type: "ReceiveFromChain", srcChainId: CHAIN_1, to: BOB, amount: 400n },
    ]);
  });

  it("credits the zero address to the dead address", () => {
    const { endpoint, main, side } = twoChains();
    main.mint(OWNER, ALICE, 100n);
    main.sendFrom(ALICE, ALICE, CHAIN_2, ZERO_ADDRESS, 100n);
    endpoint.flush();
    expect(side.balanceOf(DEAD_ADDRESS)).toBe(100n);
  });
});

describe("secondary to main", () => {
  it("burns on the secondary and releases custody on the main chain", () => {
    const { endpoint, main, side } = twoChains();
    main.mint(OWNER, ALICE, 1000n);
    main.syncRebaseIndex(OWNER, 2n * UNIT, 5n);
    main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 500n);
    endpoint.flush();

    expect(side.sendFrom(BOB, BOB, CHAIN_1, CAROL, 500n)).toBe(250n);
    endpoint.flush();

    expect(side.totalSupply()).toBe(0n);
    expect(side.totalShares()).toBe(0n);
    expect(main.balanceOf(CAROL)).toBe(500n);
    expect(main.balanceOf(LEDGER_1)).toBe(0n);
    expect(main.circulatingSupply()).toBe(2000n);
  });

  it("does not take the index from inbound messages on the main chain", () => {
    const { endpoint, main, side } = twoChains();
    main.mint(OWNER, ALICE, 1000n);
    main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 300n);
    endpoint.flush();

    side.syncRebaseIndex(OWNER, 3n * UNIT, 9n);
    expect(side.balanceOf(BOB)).toBe(900n);
    side.sendFrom(BOB, BOB, CHAIN_1, ALICE, 900n);
    endpoint.flush();

    expect(main.rebaseIndex()).toBe(UNIT);
    expect(main.sequenceNumber()).toBe(0n);
    expect(main.balanceOf(ALICE)).toBe(1000n);
  });

  it("ignores a stale index riding on a transfer", () => {
    const { endpoint, main, side } = twoChains();
    main.mint(OWNER, ALICE, 1000n);
    side.syncRebaseIndex(OWNER, 3n * UNIT, 9n);

    main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 100n);
    endpoint.flush();

    expect(side.rebaseIndex()).toBe(3n * UNIT);
    expect(side.sequenceNumber()).toBe(9n);
    expect(side.balanceOf(BOB)).toBe(300n);
  });
});

describe("send preconditions", () => {
  it("rejects opted-out senders", () => {
    const { endpoint, main } = twoChains();
    main.mint(OWNER, ALICE, 100n);
    main.setRebaseOptOut(ALICE, ALICE, true);

    const err = catchError(() => main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 10n));
    expect(isLedgerError(err, "OptedOutBridgeRejection")).toBe(true);
    expect(main.balanceOf(ALICE)).toBe(100n);
    expect(endpoint.queued).toBe(0);
  });

  it("spends the allowance when sending on behalf of someone else", () => {
    const { main } = twoChains();
    main.mint(OWNER, ALICE, 1000n);
    main.approve(ALICE, DAVE, 400n);

    main.sendFrom(DAVE, ALICE, CHAIN_2, BOB, 300n);
    expect(main.allowance(ALICE, DAVE)).toBe(100n);
    expect(main.balanceOf(ALICE)).toBe(700n);

    const err = catchError(() => main.sendFrom(CAROL, ALICE, CHAIN_2, BOB, 1n));
    expect(isLedgerError(err, "InsufficientAllowance")).toBe(true);
  });

  it("rejects an amount worth no shares", () => {
    const { endpoint, main } = twoChains();
    main.mint(OWNER, ALICE, 1000n);
    main.syncRebaseIndex(OWNER, 2n * UNIT, 1n);

    const err = catchError(() => main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 1n));
    expect(isLedgerError(err, "ZeroAmount")).toBe(true);
    expect(main.balanceOf(ALICE)).toBe(2000n);
    expect(endpoint.queued).toBe(0);
  });

  it("rejects untrusted destinations", () => {
    const { main } = twoChains();
    main.mint(OWNER, ALICE, 1000n);
    const err = catchError(() => main.sendFrom(ALICE, ALICE, CHAIN_3, BOB, 10n));
    expect(isLedgerError(err, "UntrustedDestination")).toBe(true);
    expect(main.balanceOf(ALICE)).toBe(1000n);
  });

  it("rejects sends above the balance", () => {
    const { main } = twoChains();
    main.mint(OWNER, ALICE, 10n);
    const err = catchError(() => main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 11n));
    expect(isLedgerError(err, "InsufficientBalance")).toBe(true);
  });
});

describe("credit hooks", () => {
  it("tells the recipient about the credit", () => {
    const { endpoint, main, side } = twoChains();
    const hook = vi.fn();
    side.setCreditHook(BOB, hook);
    main.mint(OWNER, ALICE, 500n);
    main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 500n);
    endpoint.flush();
    expect(hook).toHaveBeenCalledWith(CHAIN_1, BOB, 500n);
  });

  it("keeps what a successful hook wrote", () => {
    const { endpoint, main, side } = twoChains();
    side.setCreditHook(BOB, () => side.transfer(BOB, CAROL, 100n));
    main.mint(OWNER, ALICE, 500n);
    main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 500n);
    endpoint.flush();
    expect(side.balanceOf(BOB)).toBe(400n);
    expect(side.balanceOf(CAROL)).toBe(100n);
  });

  it("reverts a failing hook but keeps the credit", () => {
    const { endpoint, main, side } = twoChains();
    side.setCreditHook(BOB, () => {
      side.transfer(BOB, CAROL, 100n);
      throw new Error("hook failed");
    });
    main.mint(OWNER, ALICE, 500n);
    main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 500n);
    endpoint.flush();

    expect(side.balanceOf(BOB)).toBe(500n);
    expect(side.balanceOf(CAROL)).toBe(0n);
    expect(side.failedMessageFingerprint(CHAIN_1, `${LEDGER_1}${LEDGER_2.slice(2)}`, asDeliverySeq(1n))).toBeNull();
  });

  it("stops calling a cleared hook", () => {
    const { endpoint, main, side } = twoChains();
    const hook = vi.fn();
    side.setCreditHook(BOB, hook);
    side.setCreditHook(BOB, null);
    main.mint(OWNER, ALICE, 500n);
    main.sendFrom(ALICE, ALICE, CHAIN_2, BOB, 500n);
    endpoint.flush();
    expect(hook).not.toHaveBeenCalled();
  });
});
