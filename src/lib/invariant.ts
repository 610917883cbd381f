export class InvariantError extends Error {
  override name = "InvariantError";
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (condition) return;
  throw new InvariantError(message);
}

/**
 * Raised when the intersection graph references a hex that the tile assignment
 * has no entry for. This means the board and the assignment disagree, not that
 * the user typed a bad number.
 */
export class MissingTileError extends InvariantError {
  override name = "MissingTileError";
  readonly hex: number;

  constructor(hex: number) {
    super(`no tile assigned to hex ${hex}`);
    this.hex = hex;
  }
}
