import { LedgerError, ledgerAssert } from "../errors";
import type { ILogger } from "../logging";
import type { Address } from "../types";
import type { EventLog } from "./events";
import type { FixedLedger } from "./fixedLedger";
import { Cell, type Journal } from "./journal";
import { checkElasticSupply } from "./math";
import { ShareLedger, type IndexSource } from "./shareLedger";

export type IndexMutator = (next: bigint, updater: Address) => void;

/**
 * Owns the rebase index and the share ledger scaled by it.
 *
 * The unguarded index setter is available only until a synchronizer claims
 * the mutator capability; from then on every index write goes through that
 * synchronizer.
 */
export class RebaseController implements IndexSource {
  readonly ledger: ShareLedger;
  private readonly index: Cell<bigint>;
  private mutatorClaimed = false;

  constructor(
    journal: Journal,
    fixed: FixedLedger,
    private readonly events: EventLog,
    private readonly log: ILogger,
    initialIndex: bigint,
  ) {
    ledgerAssert(initialIndex > 0n, "InvalidRebaseIndex", "initial rebase index must be positive");
    this.index = new Cell(journal, initialIndex);
    this.ledger = new ShareLedger(journal, fixed, this, events, log);
  }

  rebaseIndex(): bigint {
    return this.index.get();
  }

  setRebaseIndex(next: bigint, updater: Address): void {
    if (this.mutatorClaimed)
      throw new LedgerError(
        "InvalidRebaseIndexMutator",
        "rebase index is synchronized cross-chain; use the sequenced setter",
      );
    this.applyIndex(next, updater);
  }

  claimIndexMutator(): IndexMutator {
    ledgerAssert(!this.mutatorClaimed, "InvalidRebaseIndexMutator", "index mutator already claimed");
    this.mutatorClaimed = true;
    return (next, updater) => this.applyIndex(next, updater);
  }

  /**
   * Moves the account's whole balance between share and fixed accounting.
   * The observed balance is unchanged up to one unit of share rounding.
   */
  setOptOut(account: Address, disable: boolean): void {
    const ledger = this.ledger;
    if (ledger.isOptedOut(account) === disable) return;

    const balance = ledger.balanceOf(account);
    if (balance > 0n) ledger.applyUpdate(account, null, balance);
    ledger.markOptedOut(account, disable);
    if (balance > 0n) ledger.applyUpdate(null, account, balance);

    this.log.debug({ account, disable, balance: balance.toString() }, "rebase opt-out toggled");
    this.events.emit({ type: disable ? "RebaseDisabled" : "RebaseEnabled", account });
  }

  private applyIndex(next: bigint, updater: Address): void {
    if (next === this.index.get()) return;
    ledgerAssert(next > 0n, "InvalidRebaseIndex", "rebase index must be positive");
    checkElasticSupply(this.ledger.totalShares(), next, this.ledger.absoluteSupply());
    this.index.set(next);
    this.log.debug({ updater, rebaseIndex: next.toString() }, "rebase index updated");
    this.events.emit({ type: "RebaseIndexUpdated", updater, rebaseIndex: next });
  }
}
