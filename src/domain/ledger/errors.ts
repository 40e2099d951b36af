export type DomainErrorCode =
  | 'OVERFLOW'
  | 'INSUFFICIENT_FUNDS'
  | 'LOCKED_ACCOUNT'
  | 'NO_SUCH_TRANSACTION'
  | 'MISSING_AMOUNT';

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class OverflowError extends DomainError {
  readonly code = 'OVERFLOW';

  constructor(message = 'Numerical overflow') {
    super(message);
  }
}

export class InsufficientFundsError extends DomainError {
  readonly code = 'INSUFFICIENT_FUNDS';

  constructor(message = 'Insufficient funds') {
    super(message);
  }
}

export class LockedAccountError extends DomainError {
  readonly code = 'LOCKED_ACCOUNT';

  constructor(message = 'Locked account') {
    super(message);
  }
}

export class NoSuchTransactionError extends DomainError {
  readonly code = 'NO_SUCH_TRANSACTION';

  constructor(message = 'Referenced transaction not found') {
    super(message);
  }
}

export class MissingAmountError extends DomainError {
  readonly code = 'MISSING_AMOUNT';

  constructor(message = 'Amount missing in transaction CSV') {
    super(message);
  }
}
