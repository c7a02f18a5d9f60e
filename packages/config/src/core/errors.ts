import { BaseError } from "@flagini/errors"

export type FlagFileErrorCode =
  | "encoding_error"
  | "syntax_error"
  | "cyclic_import"
  | "unknown_flag"
  | "fetch_failed"
  | "invalid_value"
  | "invalid_argument"
  | "duplicate_parse"
  | "registration_error"

/** Where in the config tree a directive or line came from. */
export type SourcePosition = {
  source: string
  line: number
}

export class EncodingError extends BaseError<"encoding_error"> {
  static invalidUtf8(at: SourcePosition, cause?: unknown): EncodingError {
    return new EncodingError(`Invalid UTF-8 at line ${at.line} of ${at.source}`, {
      code: "encoding_error",
      context: { ...at },
      cause,
    })
  }
}

export class IniSyntaxError extends BaseError<"syntax_error"> {
  static unsplittable(text: string, at: SourcePosition): IniSyntaxError {
    return new IniSyntaxError(
      `Cannot split line ${at.line} of ${at.source} into key and value`,
      { code: "syntax_error", context: { ...at, text, reason: "unsplittable" } },
    )
  }

  static unterminatedQuote(text: string, at: SourcePosition): IniSyntaxError {
    return new IniSyntaxError(`Unclosed string at line ${at.line} of ${at.source}`, {
      code: "syntax_error",
      context: { ...at, text, reason: "unterminated_quote" },
    })
  }

  static malformedMultilineKey(key: string, at: SourcePosition): IniSyntaxError {
    return new IniSyntaxError(
      `Cannot find '{' in multi-line key ${key} at line ${at.line} of ${at.source}`,
      { code: "syntax_error", context: { ...at, key, reason: "malformed_multiline_key" } },
    )
  }
}

export class CyclicImportError extends BaseError<"cyclic_import"> {
  static detected(source: string, stack: readonly string[]): CyclicImportError {
    return new CyclicImportError(`Import recursion found for ${source}`, {
      code: "cyclic_import",
      context: { source, stack: [...stack] },
    })
  }
}

export class UnknownFlagError extends BaseError<"unknown_flag"> {
  static onCommandLine(name: string): UnknownFlagError {
    return new UnknownFlagError(`Flag provided but not defined: -${name}`, {
      code: "unknown_flag",
      context: { flag: name, source: "command-line" },
    })
  }

  static inDirective(key: string, at: SourcePosition): UnknownFlagError {
    return new UnknownFlagError(
      `Unknown flag ${key} at line ${at.line} of ${at.source}`,
      { code: "unknown_flag", context: { ...at, flag: key } },
    )
  }
}

export class FetchError extends BaseError<"fetch_failed"> {
  static unreadable(source: string, cause: unknown): FetchError {
    return new FetchError(`Cannot read config source ${source}`, {
      code: "fetch_failed",
      context: { source, reason: "unreadable" },
      cause,
    })
  }

  static httpStatus(source: string, status: number): FetchError {
    return new FetchError(`Unexpected HTTP status ${status} for ${source}`, {
      code: "fetch_failed",
      context: { source, status, reason: "http_status" },
      isRetryable: true,
    })
  }

  static unsecure(source: string): FetchError {
    return new FetchError(`Plain http is not allowed for ${source}`, {
      code: "fetch_failed",
      context: { source, reason: "unsecure" },
    })
  }

  static network(source: string, cause: unknown): FetchError {
    return new FetchError(`Cannot reach config source ${source}`, {
      code: "fetch_failed",
      context: { source, reason: "network" },
      cause,
      isRetryable: true,
    })
  }
}

export class SetValueError extends BaseError<"invalid_value"> {
  static rejected(
    flag: string,
    value: string,
    reason: string,
    at?: SourcePosition,
  ): SetValueError {
    const where = at ? ` at line ${at.line} of ${at.source}` : ""

    return new SetValueError(`Invalid value for flag ${flag}${where}: ${reason}`, {
      code: "invalid_value",
      context: { ...at, flag, value, reason },
    })
  }
}

export class ArgumentError extends BaseError<"invalid_argument"> {
  static badSyntax(arg: string): ArgumentError {
    return new ArgumentError(`Bad flag syntax: ${arg}`, {
      code: "invalid_argument",
      context: { arg },
    })
  }

  static missingValue(flag: string): ArgumentError {
    return new ArgumentError(`Flag needs an argument: -${flag}`, {
      code: "invalid_argument",
      context: { flag },
    })
  }
}

export class DuplicateParseError extends BaseError<"duplicate_parse"> {
  static secondCall(): DuplicateParseError {
    return new DuplicateParseError("parse() was already called on this session", {
      code: "duplicate_parse",
      isOperational: false,
    })
  }
}

export class RegistrationError extends BaseError<"registration_error"> {
  static afterParse(operation: string): RegistrationError {
    return new RegistrationError(`${operation}() must be called before parse()`, {
      code: "registration_error",
      context: { operation },
      isOperational: false,
    })
  }

  static beforeParse(operation: string): RegistrationError {
    return new RegistrationError(`${operation}() must be called after parse()`, {
      code: "registration_error",
      context: { operation },
      isOperational: false,
    })
  }

  static unknownFlag(operation: string, flag: string): RegistrationError {
    return new RegistrationError(`${operation}() names unknown flag ${flag}`, {
      code: "registration_error",
      context: { operation, flag },
      isOperational: false,
    })
  }

  static shorthandTaken(alias: string, existing: string): RegistrationError {
    return new RegistrationError(
      `Shorthand ${alias} is already registered for flag ${existing}`,
      { code: "registration_error", context: { alias, flag: existing }, isOperational: false },
    )
  }

  static shorthandIsFlag(alias: string): RegistrationError {
    return new RegistrationError(`Shorthand ${alias} is already a flag name`, {
      code: "registration_error",
      context: { alias },
      isOperational: false,
    })
  }

  static invalidDefault(flag: string, reason: string): RegistrationError {
    return new RegistrationError(`Default value of flag ${flag} is invalid: ${reason}`, {
      code: "registration_error",
      context: { flag, reason },
      isOperational: false,
    })
  }

  static duplicateFlag(flag: string): RegistrationError {
    return new RegistrationError(`Flag ${flag} is already defined`, {
      code: "registration_error",
      context: { flag },
      isOperational: false,
    })
  }
}
