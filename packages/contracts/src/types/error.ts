import type { ZodError } from "zod";

/**
 * Error codes for maze operations.
 *
 * Every code describes an invalid argument: the kernel has no other failure
 * mode. An unreachable goal is a normal search result, not an error.
 */
export type MazeErrorCode =
  | "INVALID_DIMENSIONS"
  | "INVALID_SEED"
  | "INVALID_CELL"
  | "CELLS_NOT_ADJACENT"
  | "INVALID_WALL_SET"
  | "INVALID_SHARE_CODE"
  | "INVALID_CONFIG";

/**
 * Unified error type for all maze operations.
 *
 * @example
 * ```typescript
 * throw new MazeError(
 *   "CELLS_NOT_ADJACENT",
 *   "Cells (0, 0) and (1, 1) are not adjacent",
 *   { a: { x: 0, y: 0 }, b: { x: 1, y: 1 } },
 * );
 * ```
 */
export class MazeError extends Error {
  override readonly name = "MazeError";

  constructor(
    public readonly code: MazeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MazeError);
    }
  }

  static invalidCell(
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError("INVALID_CELL", message, details);
  }

  static notAdjacent(
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError("CELLS_NOT_ADJACENT", message, details);
  }

  static invalidShareCode(
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError("INVALID_SHARE_CODE", message, details);
  }

  /**
   * Wrap a zod validation failure. Issue messages are joined into the error
   * message and kept individually under `details.issues`.
   */
  static fromZodError(code: MazeErrorCode, error: ZodError): MazeError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    const summary = issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path}: ${issue.message}` : issue.message,
      )
      .join("; ");
    return new MazeError(code, summary, { issues });
  }

  static isMazeError(error: unknown): error is MazeError {
    return error instanceof MazeError;
  }

  toJSON(): {
    name: string;
    code: MazeErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
