/**
 * A stored row could not be turned back into an expense.
 */
export class ExpenseParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line: number
  ) {
    super(`${message} (${filePath}:${line})`);
    this.name = 'ExpenseParseError';
  }
}

/**
 * The expenses file could not be opened or written.
 */
export class ExpenseWriteError extends Error {
  constructor(
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(`Could not write expenses to ${filePath}`, options);
    this.name = 'ExpenseWriteError';
  }
}

export class InputClosedError extends Error {
  constructor() {
    super('Input stream closed while waiting for an answer');
    this.name = 'InputClosedError';
  }
}
