/**
 * Switches for the two cases the transition table leaves open.
 */
export interface RulePolicy {
  /** Reject a deposit whose txId is already in the account's deposit index. */
  readonly rejectDuplicateDeposits: boolean;
  /** Reject a dispute on a txId that is currently under dispute. */
  readonly rejectActiveRedispute: boolean;
}

export const STRICT_POLICY: RulePolicy = Object.freeze({
  rejectDuplicateDeposits: true,
  rejectActiveRedispute: true,
});

/** Literal transition table: last deposit wins, active disputes may be re-applied. */
export const LENIENT_POLICY: RulePolicy = Object.freeze({
  rejectDuplicateDeposits: false,
  rejectActiveRedispute: false,
});
