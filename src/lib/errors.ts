/**
 * Error types raised by the finance engine and its adapters.
 *
 * Every error is thrown synchronously at the point of violation, before any
 * state changes, and carries a stable `code` the CLI can branch on.
 */

export type FinanceErrorCode =
  | 'InvalidAmount'
  | 'InvalidCategory'
  | 'InvalidTransactionType'
  | 'InvalidDate'
  | 'InvalidPeriod'
  | 'NoProfileSet'
  | 'InvalidRiskTolerance'
  | 'UnknownAction'
  | 'InvalidArguments'
  | 'InvalidSnapshot'
  | 'ConfigError';

export class FinanceError extends Error {
  readonly code: FinanceErrorCode;

  constructor(code: FinanceErrorCode, message: string) {
    super(message);
    this.name = 'FinanceError';
    this.code = code;
  }
}

export class InvalidAmountError extends FinanceError {
  constructor(amount: unknown) {
    super('InvalidAmount', `Amount must be a non-negative number (received '${String(amount)}')`);
    this.name = 'InvalidAmountError';
  }
}

export class InvalidCategoryError extends FinanceError {
  constructor() {
    super('InvalidCategory', 'Category must not be empty');
    this.name = 'InvalidCategoryError';
  }
}

export class InvalidTransactionTypeError extends FinanceError {
  constructor(type: unknown) {
    super(
      'InvalidTransactionType',
      `Transaction type must be 'income' or 'expense' (received '${String(type)}')`
    );
    this.name = 'InvalidTransactionTypeError';
  }
}

export class InvalidDateError extends FinanceError {
  constructor(date: unknown) {
    super('InvalidDate', `Date must be a valid YYYY-MM-DD calendar date (received '${String(date)}')`);
    this.name = 'InvalidDateError';
  }
}

export class InvalidPeriodError extends FinanceError {
  constructor(year: number, month: number) {
    super('InvalidPeriod', `Invalid period ${year}-${month}: month must be 1-12 and year an integer`);
    this.name = 'InvalidPeriodError';
  }
}

export class NoProfileSetError extends FinanceError {
  constructor() {
    super('NoProfileSet', 'No investment profile set. Run set_profile first.');
    this.name = 'NoProfileSetError';
  }
}

export class InvalidRiskToleranceError extends FinanceError {
  constructor(value: unknown) {
    super(
      'InvalidRiskTolerance',
      `Risk tolerance must be one of low, medium, high (received '${String(value)}')`
    );
    this.name = 'InvalidRiskToleranceError';
  }
}

export class UnknownActionError extends FinanceError {
  constructor(action: string) {
    super('UnknownAction', `Unknown action '${action}'. Run 'help' to list available actions.`);
    this.name = 'UnknownActionError';
  }
}

export class InvalidArgumentsError extends FinanceError {
  readonly issues: string[];

  constructor(action: string, issues: string[]) {
    super('InvalidArguments', `Invalid arguments for '${action}': ${issues.join('; ')}`);
    this.name = 'InvalidArgumentsError';
    this.issues = issues;
  }
}

export class InvalidSnapshotError extends FinanceError {
  constructor(reason: string) {
    super('InvalidSnapshot', `Stored workspace is malformed: ${reason}`);
    this.name = 'InvalidSnapshotError';
  }
}

export class ConfigError extends FinanceError {
  constructor(message: string) {
    super('ConfigError', message);
    this.name = 'ConfigError';
  }
}

export function isFinanceError(error: unknown): error is FinanceError {
  return error instanceof FinanceError;
}
