import type { ILogger } from "../logging";
import type { Address } from "../types";
import { Cell, type Journal } from "./journal";
import type { IndexMutator, RebaseController } from "./rebaseController";

/**
 * Sequence-gated index updates. A stale sequence number is ignored rather
 * than rejected, so replayed or reordered messages can never roll the index
 * back.
 */
export class CrossChainSync {
  private readonly sequence: Cell<bigint>;
  private readonly mutate: IndexMutator;

  constructor(
    journal: Journal,
    controller: RebaseController,
    private readonly log: ILogger,
  ) {
    this.mutate = controller.claimIndexMutator();
    this.sequence = new Cell(journal, 0n);
  }

  currentSequenceNumber(): bigint {
    return this.sequence.get();
  }

  /** Returns false when the update was stale and ignored. */
  syncIndex(index: bigint, sequenceNumber: bigint, updater: Address): boolean {
    const stored = this.sequence.get();
    if (sequenceNumber < stored) {
      this.log.debug(
        { sequenceNumber: sequenceNumber.toString(), stored: stored.toString() },
        "stale index update ignored",
      );
      return false;
    }
    this.mutate(index, updater);
    if (sequenceNumber !== stored) this.sequence.set(sequenceNumber);
    return true;
  }
}
