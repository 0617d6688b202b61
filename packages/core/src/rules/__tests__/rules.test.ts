import { describe, expect, it } from 'vitest';

import { assertErr, assertOk, tx } from '../../__tests__/test-utils.js';
import { Account } from '../../domain/account.js';
import { chargeback } from '../chargeback.js';
import { deposit } from '../deposit.js';
import { dispute } from '../dispute.js';
import { resolve } from '../resolve.js';
import { LENIENT_POLICY } from '../rule-policy.js';
import {
  AlreadyDisputedError,
  DepositNotFoundError,
  DuplicateDepositError,
  InsufficientFundsError,
  MissingAmountError,
  TransactionNotDisputedError,
} from '../rule.errors.js';
import { withdrawal } from '../withdrawal.js';

function accountWithDeposit(txId: number, value: string): Account {
  const account = new Account(1);
  assertOk(deposit(account, tx('deposit', 1, txId, value)));
  return account;
}

describe('deposit', () => {
  it('should credit available and record the amount', () => {
    const account = new Account(1);

    assertOk(deposit(account, tx('deposit', 1, 1, '10.5')));

    expect(account.snapshot()).toEqual({ client: 1, available: '10.5', held: '0', total: '10.5', locked: false });
    expect(account.depositAmount(1)?.toString()).toBe('10.5');
  });

  it('should fail without an amount', () => {
    const account = new Account(1);

    const error = assertErr(deposit(account, tx('deposit', 1, 1)));

    expect(error).toBeInstanceOf(MissingAmountError);
    expect(error.message).toBe('Transaction 1 is a deposit without an amount');
    expect(account.toState()).toEqual(new Account(1).toState());
  });

  it('should refuse a repeated transaction id', () => {
    const account = accountWithDeposit(5, '3');
    const before = account.toState();

    const error = assertErr(deposit(account, tx('deposit', 1, 5, '4')));

    expect(error).toBeInstanceOf(DuplicateDepositError);
    expect(error.code).toBe('DUPLICATE_DEPOSIT');
    expect(account.toState()).toEqual(before);
  });

  it('should credit a repeated id under the lenient policy, keeping the latest amount', () => {
    const account = accountWithDeposit(5, '3');

    assertOk(deposit(account, tx('deposit', 1, 5, '4'), LENIENT_POLICY));

    expect(account.available.toString()).toBe('7');
    expect(account.depositAmount(5)?.toString()).toBe('4');
  });

  it('should accept a zero amount', () => {
    const account = new Account(1);

    assertOk(deposit(account, tx('deposit', 1, 1, '0')));

    expect(account.available.isZero()).toBe(true);
    expect(account.depositAmount(1)?.isZero()).toBe(true);
  });
});

describe('withdrawal', () => {
  it('should debit available', () => {
    const account = accountWithDeposit(1, '10');

    assertOk(withdrawal(account, tx('withdrawal', 1, 2, '4.25')));

    expect(account.available.toString()).toBe('5.75');
    expect(account.held.isZero()).toBe(true);
  });

  it('should allow withdrawing the exact balance', () => {
    const account = accountWithDeposit(1, '10');

    assertOk(withdrawal(account, tx('withdrawal', 1, 2, '10')));

    expect(account.available.toString()).toBe('0');
  });

  it('should refuse to overdraw and leave the account unchanged', () => {
    const account = accountWithDeposit(1, '10');
    const before = account.toState();

    const error = assertErr(withdrawal(account, tx('withdrawal', 1, 2, '10.0001')));

    expect(error).toBeInstanceOf(InsufficientFundsError);
    expect(error.message).toBe('Withdrawal 2 of 10.0001 exceeds available 10');
    expect(error.details).toEqual({ txId: 2, available: '10', requested: '10.0001' });
    expect(account.toState()).toEqual(before);
  });

  it('should fail without an amount', () => {
    const account = accountWithDeposit(1, '10');

    expect(assertErr(withdrawal(account, tx('withdrawal', 1, 2)))).toBeInstanceOf(MissingAmountError);
  });

  it('should not index withdrawals as disputable', () => {
    const account = accountWithDeposit(1, '10');
    assertOk(withdrawal(account, tx('withdrawal', 1, 2, '1')));

    expect(account.depositAmount(2)).toBeUndefined();
    expect(assertErr(dispute(account, tx('dispute', 1, 2)))).toBeInstanceOf(DepositNotFoundError);
  });
});

describe('dispute', () => {
  it('should move the deposit amount from available to held', () => {
    const account = accountWithDeposit(1, '20');

    assertOk(dispute(account, tx('dispute', 1, 1)));

    expect(account.snapshot()).toEqual({ client: 1, available: '0', held: '20', total: '20', locked: false });
    expect(account.isDisputed(1)).toBe(true);
  });

  it('should let available go negative after a partial withdrawal', () => {
    const account = accountWithDeposit(1, '20');
    assertOk(withdrawal(account, tx('withdrawal', 1, 2, '15')));

    assertOk(dispute(account, tx('dispute', 1, 1)));

    expect(account.available.toString()).toBe('-15');
    expect(account.held.toString()).toBe('20');
    expect(account.total().toString()).toBe('5');
  });

  it('should ignore any amount on the dispute record', () => {
    const account = accountWithDeposit(1, '20');

    assertOk(dispute(account, tx('dispute', 1, 1, '999')));

    expect(account.held.toString()).toBe('20');
  });

  it('should fail for an unknown deposit', () => {
    const account = accountWithDeposit(1, '20');

    const error = assertErr(dispute(account, tx('dispute', 1, 42)));

    expect(error).toBeInstanceOf(DepositNotFoundError);
    expect(error.message).toBe('Deposit not found: 42');
  });

  it('should refuse to dispute an already disputed deposit', () => {
    const account = accountWithDeposit(1, '20');
    assertOk(dispute(account, tx('dispute', 1, 1)));
    const before = account.toState();

    expect(assertErr(dispute(account, tx('dispute', 1, 1)))).toBeInstanceOf(AlreadyDisputedError);
    expect(account.toState()).toEqual(before);
  });

  it('should hold the amount twice under the lenient policy', () => {
    const account = accountWithDeposit(1, '20');
    assertOk(dispute(account, tx('dispute', 1, 1), LENIENT_POLICY));

    assertOk(dispute(account, tx('dispute', 1, 1), LENIENT_POLICY));

    expect(account.available.toString()).toBe('-20');
    expect(account.held.toString()).toBe('40');
  });

  it('should allow a new dispute after the previous one resolved', () => {
    const account = accountWithDeposit(1, '20');
    assertOk(dispute(account, tx('dispute', 1, 1)));
    assertOk(resolve(account, tx('resolve', 1, 1)));

    assertOk(dispute(account, tx('dispute', 1, 1)));

    expect(account.held.toString()).toBe('20');
  });
});

describe('resolve', () => {
  it('should release the held amount back to available', () => {
    const account = accountWithDeposit(1, '20');
    assertOk(dispute(account, tx('dispute', 1, 1)));

    assertOk(resolve(account, tx('resolve', 1, 1)));

    expect(account.snapshot()).toEqual({ client: 1, available: '20', held: '0', total: '20', locked: false });
    expect(account.isDisputed(1)).toBe(false);
  });

  it('should fail when the deposit is not under dispute', () => {
    const account = accountWithDeposit(1, '20');

    const error = assertErr(resolve(account, tx('resolve', 1, 1)));

    expect(error).toBeInstanceOf(TransactionNotDisputedError);
    expect(error.message).toBe('Transaction not under dispute: 1');
  });

  it('should report an unknown deposit before checking the dispute', () => {
    const account = new Account(1);

    expect(assertErr(resolve(account, tx('resolve', 1, 9)))).toBeInstanceOf(DepositNotFoundError);
  });
});

describe('chargeback', () => {
  it('should remove the held amount and freeze the account', () => {
    const account = accountWithDeposit(1, '20');
    assertOk(deposit(account, tx('deposit', 1, 2, '5')));
    assertOk(dispute(account, tx('dispute', 1, 1)));

    assertOk(chargeback(account, tx('chargeback', 1, 1)));

    expect(account.snapshot()).toEqual({ client: 1, available: '5', held: '0', total: '5', locked: true });
    expect(account.isDisputed(1)).toBe(false);
  });

  it('should fail when the deposit is not under dispute', () => {
    const account = accountWithDeposit(1, '20');
    const before = account.toState();

    expect(assertErr(chargeback(account, tx('chargeback', 1, 1)))).toBeInstanceOf(TransactionNotDisputedError);
    expect(account.toState()).toEqual(before);
    expect(account.frozen).toBe(false);
  });

  it('should fail for an unknown deposit', () => {
    const account = new Account(1);

    expect(assertErr(chargeback(account, tx('chargeback', 1, 3)))).toBeInstanceOf(DepositNotFoundError);
  });
});
