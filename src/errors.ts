/** Raised when an engine operation is called in a phase that does not allow it. */
export class InvalidStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

/** Raised when food cannot be placed because every cell is occupied. */
export class BoardFullError extends Error {
  readonly boardSize: number;

  constructor(boardSize: number) {
    super(`no free cell left for food on a ${boardSize}x${boardSize} board`);
    this.name = 'BoardFullError';
    this.boardSize = boardSize;
  }
}
