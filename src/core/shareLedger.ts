import { LedgerError } from "../errors";
import type { ILogger } from "../logging";
import type { Account, Address } from "../types";
import { ZERO_ADDRESS } from "../utils/bytes";
import type { EventLog } from "./events";
import type { FixedLedger } from "./fixedLedger";
import { Cell, JournaledMap, type Journal } from "./journal";
import { checkAmount, checkElasticSupply, toShares, toTokens } from "./math";

/** Read side of the rebase index; the controller owns the write side. */
export interface IndexSource {
  rebaseIndex(): bigint;
}

/**
 * Share accounting. Non-opted-out balances are stored as shares and derived
 * through the current index, so an index change touches no account.
 * Opted-out balances live in the {@link FixedLedger}.
 */
export class ShareLedger {
  private readonly shares: JournaledMap<Address, bigint>;
  private readonly optedOut: JournaledMap<Address, boolean>;
  private readonly shareTotal: Cell<bigint>;

  constructor(
    journal: Journal,
    readonly fixed: FixedLedger,
    private readonly index: IndexSource,
    private readonly events: EventLog,
    private readonly log: ILogger,
  ) {
    this.shares = new JournaledMap(journal, 0n);
    this.optedOut = new JournaledMap(journal, false);
    this.shareTotal = new Cell(journal, 0n);
  }

  /* ── reads ───────────────────────────────────────────────── */

  account(account: Address): Account {
    return { shares: this.shares.get(account), optedOut: this.optedOut.get(account) };
  }

  sharesOf(account: Address): bigint {
    return this.shares.get(account);
  }

  isOptedOut(account: Address): boolean {
    return this.optedOut.get(account);
  }

  totalShares(): bigint {
    return this.shareTotal.get();
  }

  absoluteSupply(): bigint {
    return this.fixed.totalSupply();
  }

  balanceOf(account: Address): bigint {
    if (this.optedOut.get(account)) return this.fixed.balanceOf(account);
    return toTokens(this.shares.get(account), this.index.rebaseIndex());
  }

  totalSupply(): bigint {
    return toTokens(this.shareTotal.get(), this.index.rebaseIndex()) + this.fixed.totalSupply();
  }

  /**
   * Shares to debit for `amount` tokens. A full-balance request returns the
   * stored share count so no rounding dust is left behind.
   */
  transferableShares(amount: bigint, from: Address): bigint {
    checkAmount(amount);
    const balance = this.balanceOf(from);
    if (amount > balance)
      throw new LedgerError("InsufficientBalance", "amount exceeds balance", {
        account: from,
        balance: balance.toString(),
        amount: amount.toString(),
      });
    if (amount === balance) return this.shares.get(from);
    return toShares(amount, this.index.rebaseIndex());
  }

  /* ── writes ──────────────────────────────────────────────── */

  /**
   * Mint (`from = null`), burn (`to = null`) or transfer `amount` tokens.
   * A side that is opted out settles through the fixed ledger, so a transfer
   * across the boundary is a burn on one representation and a mint on the
   * other.
   */
  applyUpdate(from: Address | null, to: Address | null, amount: bigint): void {
    checkAmount(amount);
    const fromOut = from !== null && this.optedOut.get(from);
    const toOut = to !== null && this.optedOut.get(to);

    if (from !== null && to !== null && fromOut && toOut) {
      this.fixed.update(from, to, amount);
    } else {
      let moved: bigint | null = null;

      if (from !== null) {
        if (fromOut) {
          this.fixed.update(from, null, amount);
        } else {
          moved = this.transferableShares(amount, from);
          this.shares.set(from, this.shares.get(from) - moved);
          this.shareTotal.set(this.shareTotal.get() - moved);
        }
      }

      if (to !== null) {
        if (toOut) {
          this.fixed.update(null, to, amount);
        } else {
          const credited = moved ?? this.mintableShares(amount);
          this.shares.set(to, this.shares.get(to) + credited);
          this.shareTotal.set(this.shareTotal.get() + credited);
        }
      }
    }

    this.log.debug(
      { from, to, amount: amount.toString() },
      "balance update",
    );
    this.events.emit({
      type: "Transfer",
      from: from ?? ZERO_ADDRESS,
      to: to ?? ZERO_ADDRESS,
      amount,
    });
  }

  /** Used by the controller's opt-out transition only. */
  markOptedOut(account: Address, optedOut: boolean): void {
    this.optedOut.set(account, optedOut);
  }

  private mintableShares(amount: bigint): bigint {
    const index = this.index.rebaseIndex();
    const shares = toShares(amount, index);
    checkElasticSupply(this.shareTotal.get() + shares, index, this.fixed.totalSupply());
    return shares;
  }
}
