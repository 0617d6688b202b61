import { Amount } from '../value-objects/amount.js';

/**
 * Output record for one account.
 */
export interface AccountSnapshot {
  client: number;
  available: string;
  held: string;
  total: string;
  locked: boolean;
}

/**
 * Plain copy of the complete account state, including both indices.
 * Two states are equal under `toEqual` exactly when the accounts are.
 */
export interface AccountState {
  clientId: number;
  available: bigint;
  held: bigint;
  frozen: boolean;
  deposits: [txId: number, units: bigint][];
  activeDisputes: number[];
}

/**
 * Per-client balances plus the minimal history needed to validate disputes:
 * the amount of every accepted deposit and the ids currently under dispute.
 *
 * Fields are mutated by the rule functions in `rules/` only.
 */
export class Account {
  available: Amount = Amount.zero();
  held: Amount = Amount.zero();
  frozen = false;

  readonly deposits = new Map<number, Amount>();
  readonly activeDisputes = new Set<number>();

  constructor(readonly clientId: number) {}

  total(): Amount {
    return this.available.add(this.held);
  }

  depositAmount(txId: number): Amount | undefined {
    return this.deposits.get(txId);
  }

  isDisputed(txId: number): boolean {
    return this.activeDisputes.has(txId);
  }

  toState(): AccountState {
    return {
      clientId: this.clientId,
      available: this.available.minorUnits,
      held: this.held.minorUnits,
      frozen: this.frozen,
      deposits: [...this.deposits.entries()]
        .map(([txId, amount]): [number, bigint] => [txId, amount.minorUnits])
        .sort(([a], [b]) => a - b),
      activeDisputes: [...this.activeDisputes].sort((a, b) => a - b),
    };
  }

  snapshot(): AccountSnapshot {
    return {
      client: this.clientId,
      available: this.available.toString(),
      held: this.held.toString(),
      total: this.total().toString(),
      locked: this.frozen,
    };
  }
}
