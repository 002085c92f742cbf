export type Rollback = () => void;

/**
 * Set of consumed nullifiers, shared by every airdrop of a deployment.
 * It is the only replay protection there is.
 */
export class NullifierLedger {
  private used: Set<bigint>;

  constructor(nullifiers: Iterable<bigint> = []) {
    this.used = new Set(nullifiers);
  }

  isUsed(nullifier: bigint): boolean {
    return this.used.has(nullifier);
  }

  /**
   * Mark a nullifier as consumed. Callers check isUsed() first, so a second
   * mark is a bug in the caller and throws.
   *
   * The returned function undoes this mark only; the claim transaction calls
   * it when the payout after the mark fails.
   */
  markUsed(nullifier: bigint): Rollback {
    if (this.used.has(nullifier)) {
      throw new Error(`Nullifier ${nullifier} is already marked as used`);
    }
    this.used.add(nullifier);

    let rolledBack = false;
    return () => {
      if (rolledBack) return;
      rolledBack = true;
      this.used.delete(nullifier);
    };
  }

  get size(): number {
    return this.used.size;
  }

  list(): bigint[] {
    return Array.from(this.used);
  }

  static from(nullifiers: Iterable<bigint>): NullifierLedger {
    return new NullifierLedger(nullifiers);
  }
}
