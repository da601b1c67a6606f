import { decodeRebasePacket, encodeRebasePacket } from "../codec/packet";
import { describeError, ledgerAssert } from "../errors";
import { big, type ILogger } from "../logging";
import type { ChainId, DeliverySeq } from "../types/brands";
import type { Address, Path } from "../types";
import { ZERO_ADDRESS } from "../utils/bytes";
import type { CrossChainSync } from "./crossChainSync";
import type { EventLog } from "./events";
import type { Journal } from "./journal";
import { toTokens } from "./math";
import type { RebaseController } from "./rebaseController";
import type { MessageTransport } from "./transport";

/** Credits to the zero address land here instead. */
export const DEAD_ADDRESS: Address = "0x000000000000000000000000000000000000dead";

/** Best-effort hook told about inbound credits; it cannot fail a receive. */
export type CreditHook = (srcChainId: ChainId, to: Address, amount: bigint) => void;

export interface BridgeOptions {
  self: Address;
  chainId: ChainId;
  mainChainId: ChainId;
  hookFor: (to: Address) => CreditHook | undefined;
}

/**
 * Main-chain ledgers hold debited tokens in custody under their own address
 * and release them on credit; every other ledger burns on debit and mints on
 * credit. The role is fixed at construction.
 */
export class ChainRoleBridge {
  readonly isMainChain: boolean;
  private readonly custody: Address | null;

  constructor(
    private readonly journal: Journal,
    private readonly controller: RebaseController,
    private readonly sync: CrossChainSync,
    private readonly transport: MessageTransport,
    private readonly events: EventLog,
    private readonly log: ILogger,
    private readonly opts: BridgeOptions,
  ) {
    this.isMainChain = opts.chainId === opts.mainChainId;
    this.custody = this.isMainChain ? opts.self : null;
    transport.attachHandler((srcChainId, srcPath, seq, payload) =>
      this.receive(srcChainId, srcPath, seq, payload),
    );
  }

  /** Returns the shares actually debited. */
  debit(caller: Address, from: Address, amount: bigint): bigint {
    const ledger = this.controller.ledger;
    const shares = ledger.transferableShares(amount, from);
    if (caller !== from) ledger.fixed.spendAllowance(from, caller, amount);
    ledger.applyUpdate(from, this.custody, amount);
    return shares;
  }

  /** Converts with the local index; returns the token amount credited. */
  credit(to: Address, shares: bigint): bigint {
    const amount = toTokens(shares, this.controller.rebaseIndex());
    this.controller.ledger.applyUpdate(this.custody, to, amount);
    return amount;
  }

  send(
    caller: Address,
    from: Address,
    dstChainId: ChainId,
    to: Address,
    amount: bigint,
    adapterParams: Uint8Array,
  ): bigint {
    ledgerAssert(
      !this.controller.ledger.isOptedOut(from),
      "OptedOutBridgeRejection",
      "opted-out balances cannot be bridged",
      { from },
    );
    const shares = this.debit(caller, from, amount);
    ledgerAssert(shares > 0n, "ZeroAmount", "amount too small to send", { amount: big(amount) });

    const rebaseIndex = this.controller.rebaseIndex();
    const sequenceNumber = this.sync.currentSequenceNumber();
    this.transport.send(
      dstChainId,
      encodeRebasePacket({ to, shares, rebaseIndex, sequenceNumber }),
      adapterParams,
    );

    const sent = toTokens(shares, rebaseIndex);
    this.log.info(
      { dstChainId, from, to, shares: big(shares), amount: big(sent), seq: big(sequenceNumber) },
      "send to chain",
    );
    this.events.emit({ type: "SendToChain", dstChainId, from, to, amount: sent });
    return shares;
  }

  receive(srcChainId: ChainId, _srcPath: Path, deliverySeq: DeliverySeq, payload: Uint8Array): void {
    const message = decodeRebasePacket(payload);

    // the main chain is the source of truth for the index
    if (!this.isMainChain)
      this.sync.syncIndex(message.rebaseIndex, message.sequenceNumber, this.opts.self);

    const to = message.to === ZERO_ADDRESS ? DEAD_ADDRESS : message.to;
    const amount = this.credit(to, message.shares);
    this.log.info(
      { srcChainId, to, shares: big(message.shares), amount: big(amount), deliverySeq: big(deliverySeq) },
      "receive from chain",
    );
    this.events.emit({ type: "ReceiveFromChain", srcChainId, to, amount });

    this.notifyRecipient(srcChainId, to, amount);
  }

  /**
   * One attempt, in its own scope. Whatever the hook wrote is reverted if it
   * throws; the credit stays.
   */
  private notifyRecipient(srcChainId: ChainId, to: Address, amount: bigint): void {
    const hook = this.opts.hookFor(to);
    if (!hook) return;
    try {
      this.journal.atomic(() => hook(srcChainId, to, amount));
    } catch (err) {
      this.log.warn({ to, srcChainId, reason: describeError(err) }, "recipient notification failed");
    }
  }
}
