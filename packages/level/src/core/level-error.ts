import { BaseError } from "@plugkit/errors"

export type LevelErrorCode = "unknown_name" | "invalid_offset" | "invalid_format"

export type OffsetFailure = "invalid syntax" | "value out of range"

export class LevelError extends BaseError<LevelErrorCode> {
  /** The name part of a level string matched none of the named levels. */
  static unknownName(name: string, input: string): LevelError {
    return new LevelError(`level has unknown name: ${name}`, {
      code: "unknown_name",
      context: { name, input },
    })
  }

  /** The offset part of a level string is not a signed decimal integer. */
  static invalidOffset(offset: string, input: string, reason: OffsetFailure): LevelError {
    return new LevelError(
      `level string ${JSON.stringify(input)}: parsing ${JSON.stringify(offset)}: ${reason}`,
      {
        code: "invalid_offset",
        context: { offset, input, reason },
      },
    )
  }

  /** A JSON-encoded level was not a quoted string. */
  static invalidFormat(data: string, cause?: unknown): LevelError {
    return new LevelError(`level JSON is not a quoted string: ${data}`, {
      code: "invalid_format",
      context: { data },
      ...(cause !== undefined && { cause }),
    })
  }
}

export function isLevelError(err: unknown, code?: LevelErrorCode): err is LevelError {
  return err instanceof LevelError && (code === undefined || err.code === code)
}
