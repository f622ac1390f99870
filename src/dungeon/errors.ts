export type DecodeErrorCode = "OutOfBounds" | "MalformedHeader" | "TruncatedGrid";

function hex(offset: number): string {
  // Negative and fractional offsets are printed as given.
  if (!Number.isInteger(offset) || offset < 0) return String(offset);
  return "0x" + offset.toString(16).toUpperCase().padStart(4, "0");
}

export class DungeonDecodeError extends Error {
  public constructor(
    public readonly code: DecodeErrorCode,
    public readonly offset: number,
    detail: string,
  ) {
    super(`${code} at ${hex(offset)}: ${detail}`);
    this.name = "DungeonDecodeError";
  }
}

export function isDungeonDecodeError(e: unknown): e is DungeonDecodeError {
  return e instanceof DungeonDecodeError;
}
