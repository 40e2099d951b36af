import { Money } from './money.js';
import { ClientId } from './transactions.js';
import {
  InsufficientFundsError,
  LockedAccountError,
} from './errors.js';

/**
 * Account state (immutable snapshot).
 */
export interface AccountState {
  readonly clientId: ClientId;
  readonly available: Money;
  readonly held: Money;
  readonly locked: boolean;
}

/**
 * Account - per-client balance state machine.
 * Every operation computes the next state in full and only then commits it,
 * so a thrown error leaves the account untouched.
 */
export class Account {
  private constructor(private state: AccountState) {}

  /**
   * Create a new unlocked Account with zero balances.
   */
  static create(clientId: ClientId): Account {
    return new Account({
      clientId,
      available: Money.zero(),
      held: Money.zero(),
      locked: false,
    });
  }

  /**
   * Get current state (immutable snapshot).
   */
  getState(): AccountState {
    return { ...this.state };
  }

  /**
   * Total balance: available + held.
   */
  total(): Money {
    return this.state.available.add(this.state.held);
  }

  /**
   * Credit available funds.
   */
  deposit(amount: Money): void {
    this.assertUnlocked();

    this.commit({
      ...this.state,
      available: this.state.available.add(amount),
    });
  }

  /**
   * Debit available funds. The only operation that enforces sufficiency.
   */
  withdraw(amount: Money): void {
    this.assertUnlocked();

    const available = this.state.available.subtract(amount);
    if (available.compare(Money.zero()) < 0) {
      throw new InsufficientFundsError();
    }

    this.commit({ ...this.state, available });
  }

  /**
   * Freeze `amount` of a disputed deposit. Not checked against the lock.
   */
  dispute(amount: Money): void {
    this.commit({
      ...this.state,
      available: this.state.available.subtract(amount),
      held: this.state.held.add(amount),
    });
  }

  /**
   * Release a previously disputed amount back to available funds.
   */
  resolve(amount: Money): void {
    this.commit({
      ...this.state,
      available: this.state.available.add(amount),
      held: this.state.held.subtract(amount),
    });
  }

  /**
   * Reverse a disputed deposit and lock the account for good.
   */
  chargeback(amount: Money): void {
    this.commit({
      ...this.state,
      held: this.state.held.subtract(amount),
      locked: true,
    });
  }

  private assertUnlocked(): void {
    if (this.state.locked) {
      throw new LockedAccountError();
    }
  }

  private commit(next: AccountState): void {
    // total must stay representable
    next.available.add(next.held);
    this.state = next;
  }
}
