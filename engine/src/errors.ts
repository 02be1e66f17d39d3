import type { PrimitiveID } from "./types.js";

export class GisError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A malformed record in a scene file. `line` is 1-based. */
export class FormatError extends GisError {
  readonly line: number;
  readonly content: string;
  readonly reason: string;

  constructor(line: number, content: string, reason: string) {
    super(`Line ${line}: ${reason}: "${content}"`);
    this.line = line;
    this.content = content;
    this.reason = reason;
  }
}

export class InvalidGeometryError extends GisError {}

export class NotFoundError extends GisError {
  readonly id: PrimitiveID;

  constructor(id: PrimitiveID) {
    super(`Primitive ${id} not found`);
    this.id = id;
  }
}

export class IndexOutOfRangeError extends GisError {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number) {
    super(`Vertex index ${index} out of range (0..${size - 1})`);
    this.index = index;
    this.size = size;
  }
}

export class InvalidConfigError extends GisError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
