import { Account } from './account.js';
import { Money } from './money.js';
import { ClientId, Tx, TxId } from './transactions.js';
import { NoSuchTransactionError } from './errors.js';

/**
 * Final state of one account, as emitted after a replay.
 */
export interface AccountRecord {
  readonly client: ClientId;
  readonly available: Money;
  readonly held: Money;
  readonly total: Money;
  readonly locked: boolean;
}

/**
 * Bank - owns every account and the amounts of past deposits.
 *
 * Only deposits are remembered, so only deposits can be disputed.
 * There is no per-transaction dispute state: the same deposit may be
 * disputed, resolved and disputed again.
 */
export class Bank {
  private readonly accountsByClient = new Map<ClientId, Account>();
  private readonly amounts = new Map<TxId, Money>();

  /**
   * Apply a single transaction. Throws a DomainError when the transaction
   * is rejected; account state is then as it was before the call.
   */
  process(tx: Tx): void {
    switch (tx.type) {
      case 'deposit':
        this.accountFor(tx.client).deposit(tx.amount);
        this.amounts.set(tx.id, tx.amount);
        return;
      case 'withdrawal':
        this.accountFor(tx.client).withdraw(tx.amount);
        return;
      case 'dispute': {
        const amount = this.amountOf(tx.id);
        this.accountFor(tx.client).dispute(amount);
        return;
      }
      case 'resolve': {
        const amount = this.amountOf(tx.id);
        this.accountFor(tx.client).resolve(amount);
        return;
      }
      case 'chargeback': {
        const amount = this.amountOf(tx.id);
        this.accountFor(tx.client).chargeback(amount);
        return;
      }
    }
  }

  account(client: ClientId): Account | undefined {
    return this.accountsByClient.get(client);
  }

  /**
   * Accounts in the order their clients were first referenced.
   */
  accounts(): Account[] {
    return [...this.accountsByClient.values()];
  }

  toRecords(): AccountRecord[] {
    return this.accounts().map((account) => {
      const state = account.getState();
      return {
        client: state.clientId,
        available: state.available,
        held: state.held,
        total: account.total(),
        locked: state.locked,
      };
    });
  }

  // Any transaction kind opens the account once its amount is known
  private accountFor(client: ClientId): Account {
    let account = this.accountsByClient.get(client);
    if (!account) {
      account = Account.create(client);
      this.accountsByClient.set(client, account);
    }
    return account;
  }

  private amountOf(id: TxId): Money {
    const amount = this.amounts.get(id);
    if (!amount) {
      throw new NoSuchTransactionError();
    }
    return amount;
  }
}
