import type { LedgerConfig } from "./config";
import { EventLog } from "./core/events";
import { FixedLedger } from "./core/fixedLedger";
import { Journal } from "./core/journal";
import { RebaseController } from "./core/rebaseController";
import { ledgerAssert } from "./errors";
import { big, makeLogger, type ILogger } from "./logging";
import type { ChainId } from "./types/brands";
import type { Account, Address, Listener } from "./types";
import { ZERO_ADDRESS, normalizeAddress } from "./utils/bytes";

export interface TokenDeps {
  logger?: ILogger;
}

/**
 * Single-chain elastic-supply token. Every mutating method is one atomic
 * operation: it either completes or leaves no trace, and its notifications
 * reach subscribers only after it completes.
 *
 * `caller` plays the role of the transaction sender.
 */
export class RebaseToken {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly chainId: ChainId;
  readonly address: Address;
  readonly owner: Address;

  protected readonly journal = new Journal();
  protected readonly log: ILogger;
  protected readonly events: EventLog;
  protected readonly fixed: FixedLedger;
  protected readonly controller: RebaseController;

  constructor(config: LedgerConfig, deps: TokenDeps = {}) {
    this.name = config.name;
    this.symbol = config.symbol;
    this.decimals = config.decimals;
    this.chainId = config.chainId;
    this.address = config.address;
    this.owner = config.owner;
    this.log = (deps.logger ?? makeLogger()).child({ chainId: config.chainId, ledger: config.address });
    this.events = new EventLog(this.journal, this.log);
    this.fixed = new FixedLedger(this.journal, this.events);
    this.controller = new RebaseController(
      this.journal,
      this.fixed,
      this.events,
      this.log,
      config.initialRebaseIndex,
    );
  }

  /* ── reads ───────────────────────────────────────────────── */

  balanceOf(account: Address): bigint {
    return this.controller.ledger.balanceOf(normalizeAddress(account));
  }

  sharesOf(account: Address): bigint {
    return this.controller.ledger.sharesOf(normalizeAddress(account));
  }

  isOptedOut(account: Address): boolean {
    return this.controller.ledger.isOptedOut(normalizeAddress(account));
  }

  account(account: Address): Account {
    return this.controller.ledger.account(normalizeAddress(account));
  }

  totalSupply(): bigint {
    return this.controller.ledger.totalSupply();
  }

  totalShares(): bigint {
    return this.controller.ledger.totalShares();
  }

  /** Sum of opted-out balances. */
  absoluteSupply(): bigint {
    return this.controller.ledger.absoluteSupply();
  }

  rebaseIndex(): bigint {
    return this.controller.rebaseIndex();
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.fixed.allowance(normalizeAddress(owner), normalizeAddress(spender));
  }

  subscribe(listener: Listener): () => void {
    return this.events.subscribe(listener);
  }

  /* ── token operations ────────────────────────────────────── */

  transfer(caller: Address, to: Address, amount: bigint): void {
    this.atomic(() => {
      const dst = this.nonZero(to);
      this.controller.ledger.applyUpdate(normalizeAddress(caller), dst, amount);
    });
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this.atomic(() => this.fixed.approve(normalizeAddress(caller), this.nonZero(spender), amount));
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void {
    this.atomic(() => {
      const src = normalizeAddress(from);
      this.fixed.spendAllowance(src, normalizeAddress(caller), amount);
      this.controller.ledger.applyUpdate(src, this.nonZero(to), amount);
    });
  }

  mint(caller: Address, to: Address, amount: bigint): void {
    this.atomic(() => {
      this.onlyOwner(caller);
      this.controller.ledger.applyUpdate(null, this.nonZero(to), amount);
      this.log.info({ to, amount: big(amount) }, "minted");
    });
  }

  /** The account itself or the owner may toggle; opting back in is allowed. */
  setRebaseOptOut(caller: Address, account: Address, disable: boolean): void {
    this.atomic(() => {
      const who = normalizeAddress(account);
      const sender = normalizeAddress(caller);
      ledgerAssert(sender === who || sender === this.owner, "NotOwner", "only the account or the owner", {
        caller: sender,
        account: who,
      });
      this.controller.setOptOut(who, disable);
    });
  }

  /** Single-argument index setter; rejected once cross-chain sync is wired in. */
  setRebaseIndex(caller: Address, index: bigint): void {
    this.atomic(() => {
      this.onlyOwner(caller);
      this.controller.setRebaseIndex(index, normalizeAddress(caller));
    });
  }

  /* ── plumbing ────────────────────────────────────────────── */

  protected atomic<T>(fn: () => T): T {
    return this.journal.atomic(fn);
  }

  protected onlyOwner(caller: Address): void {
    ledgerAssert(normalizeAddress(caller) === this.owner, "NotOwner", "caller is not the owner", { caller });
  }

  protected nonZero(account: Address): Address {
    const addr = normalizeAddress(account);
    ledgerAssert(addr !== ZERO_ADDRESS, "ZeroAddress", "zero address");
    return addr;
  }
}
