
export class HuffError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HuffError';
  }
}

/*
  Input (and hence the frequency map) was empty, there is no tree to build
*/
export class EmptyInputError extends HuffError {
  constructor(message = 'Cannot encode empty input') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

export class AllocationFailure extends HuffError {
  constructor(
    public requestedBytes: number,
    reason: string,
  ) {
    super(`Failed to allocate ${requestedBytes} bytes: ${reason}`);
    this.name = 'AllocationFailure';
  }
}

/*
  A byte had no table entry during the encoding pass. The table is built
    from the same input, so this is always an internal invariant violation.
*/
export class MissingCodeError extends HuffError {
  constructor(
    public byte: number,
    public pos: number,
  ) {
    super(`No code exists for byte 0x${byte.toString(16).padStart(2, '0')} at position ${pos}`);
    this.name = 'MissingCodeError';
  }
}
