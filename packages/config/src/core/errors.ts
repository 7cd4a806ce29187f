import { BaseError } from "@stratum/errors"

export type ConfigErrorCode =
  | "invalid_target"
  | "document_parse"
  | "document_read"
  | "field_binding"
  | "invalid_value"
  | "unmarshal_failed"
  | "marshal_failed"
  | "unsupported_type"
  | "invalid_syntax"
  | "out_of_range"

/** Where a value being bound came from. */
export type BindingSource = "env" | "flag" | "document"

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export class ConfigError<C extends ConfigErrorCode = ConfigErrorCode> extends BaseError<C> {}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError
}

/** The schema or the record handed to a binder cannot be walked. */
export class InvalidTargetError extends ConfigError<"invalid_target"> {
  constructor(message: string, path?: string) {
    super(message, {
      code: "invalid_target",
      isOperational: false,
      ...(path !== undefined && { context: { path } }),
    })
  }
}

export class DocumentError extends ConfigError<"document_parse" | "document_read"> {
  static parseFailed(cause: unknown): DocumentError {
    return new DocumentError(`failed to unmarshal config data: ${messageOf(cause)}`, {
      code: "document_parse",
      cause,
    })
  }

  static readFailed(file: string, cause: unknown): DocumentError {
    return new DocumentError(`failed to read config file: ${messageOf(cause)}`, {
      code: "document_read",
      context: { file },
      cause,
    })
  }
}

/** A value was found for a field but could not be stored in it. */
export class FieldBindingError extends ConfigError<"field_binding"> {
  readonly source: BindingSource
  readonly path: string
  readonly key: string

  constructor(source: BindingSource, path: string, key: string, cause: unknown) {
    super(`error setting field for ${key}: ${messageOf(cause)}`, {
      code: "field_binding",
      context: { source, path, key },
      cause,
    })
    this.source = source
    this.path = path
    this.key = key
  }
}

export type ValueKind = "int" | "uint" | "float" | "bool"

export class InvalidValueError extends ConfigError<"invalid_value"> {
  constructor(kind: ValueKind, cause: unknown) {
    super(`invalid ${kind}: ${messageOf(cause)}`, {
      code: "invalid_value",
      context: { kind },
      cause,
    })
  }
}

export class UnmarshalError extends ConfigError<"unmarshal_failed"> {
  static custom(cause: unknown): UnmarshalError {
    return new UnmarshalError(`failed to unmarshal custom field: ${messageOf(cause)}`, {
      code: "unmarshal_failed",
      context: { converter: "custom" },
      cause,
    })
  }

  static text(cause: unknown): UnmarshalError {
    return new UnmarshalError(`failed to unmarshal field: ${messageOf(cause)}`, {
      code: "unmarshal_failed",
      context: { converter: "text" },
      cause,
    })
  }
}

export class MarshalError extends ConfigError<"marshal_failed"> {
  constructor(path: string, cause: unknown) {
    super(`failed to marshal field ${path}: ${messageOf(cause)}`, {
      code: "marshal_failed",
      context: { path },
      cause,
    })
  }
}

export class UnsupportedTypeError extends ConfigError<"unsupported_type"> {
  constructor(typeName: string) {
    super(`unsupported field type: ${typeName}`, {
      code: "unsupported_type",
      context: { type: typeName },
      isOperational: false,
    })
  }
}

/** Text that does not parse as the field kind, or a number that does not fit. */
export class ParseValueError extends ConfigError<"invalid_syntax" | "out_of_range"> {
  static syntax(text: string): ParseValueError {
    return new ParseValueError(`parsing ${JSON.stringify(text)}: invalid syntax`, {
      code: "invalid_syntax",
      context: { text },
    })
  }

  static range(text: string): ParseValueError {
    return new ParseValueError(`parsing ${JSON.stringify(text)}: value out of range`, {
      code: "out_of_range",
      context: { text },
    })
  }
}
