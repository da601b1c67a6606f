import { LedgerError, ledgerAssert } from "../errors";
import type { Address } from "../types";
import type { EventLog } from "./events";
import { Cell, JournaledMap, type Journal } from "./journal";
import { MAX_UINT256, checkAmount } from "./math";

/**
 * Plain fungible bookkeeping: absolute balances, their supply and
 * allowances. Under the rebase layer it only ever holds opted-out accounts
 * (and main-chain custody when custody is opted out).
 */
export class FixedLedger {
  private readonly balances: JournaledMap<Address, bigint>;
  private readonly allowances: JournaledMap<`${Address}:${Address}`, bigint>;
  private readonly supply: Cell<bigint>;

  constructor(
    journal: Journal,
    private readonly events: EventLog,
  ) {
    this.balances = new JournaledMap(journal, 0n);
    this.allowances = new JournaledMap(journal, 0n);
    this.supply = new Cell(journal, 0n);
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account);
  }

  totalSupply(): bigint {
    return this.supply.get();
  }

  /** `from = null` mints, `to = null` burns. */
  update(from: Address | null, to: Address | null, amount: bigint): void {
    checkAmount(amount);
    if (from === null) {
      const next = this.supply.get() + amount;
      ledgerAssert(next <= MAX_UINT256, "RebaseOverflow", "absolute supply overflow");
      this.supply.set(next);
    } else {
      const bal = this.balances.get(from);
      if (bal < amount)
        throw new LedgerError("InsufficientBalance", "transfer amount exceeds balance", {
          account: from,
          balance: bal.toString(),
          amount: amount.toString(),
        });
      this.balances.set(from, bal - amount);
    }

    if (to === null) this.supply.set(this.supply.get() - amount);
    else this.balances.set(to, this.balances.get(to) + amount);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(`${owner}:${spender}`);
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    checkAmount(amount);
    this.allowances.set(`${owner}:${spender}`, amount);
    this.events.emit({ type: "Approval", owner, spender, amount });
  }

  /** An allowance of MAX_UINT256 is treated as unlimited. */
  spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    checkAmount(amount);
    const current = this.allowance(owner, spender);
    if (current === MAX_UINT256) return;
    if (current < amount)
      throw new LedgerError("InsufficientAllowance", "insufficient allowance", {
        owner,
        spender,
        allowance: current.toString(),
        amount: amount.toString(),
      });
    this.allowances.set(`${owner}:${spender}`, current - amount);
  }
}
