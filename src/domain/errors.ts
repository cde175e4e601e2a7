export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Edit requested for a row that does not exist */
export class PositionOutOfRangeError extends LedgerError {
  readonly position: number;
  readonly count: number;

  constructor(position: number, count: number) {
    super(
      count === 0
        ? `No transactions to edit (requested position ${position})`
        : `Position ${position} is out of range (0-${count - 1})`,
    );
    this.position = position;
    this.count = count;
  }
}

/** Uploaded file could not be read as a ledger table */
export class ImportError extends LedgerError {}
