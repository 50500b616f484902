import { BaseError } from "@tessera/errors"

export type RepositoryErrorCode = "invalid_options" | "load_failed" | "parse_failed" | "read_only"

export class RepositoryError extends BaseError<RepositoryErrorCode> {
  static invalidOptions(reason: string, context: Record<string, unknown>): RepositoryError {
    return new RepositoryError(`Invalid repository options: ${reason}`, {
      code: "invalid_options",
      context,
      isOperational: false,
    })
  }

  static loadFailed(location: string, cause: unknown): RepositoryError {
    return new RepositoryError(`Failed to load configurations from ${location}`, {
      code: "load_failed",
      context: { location },
      cause,
      isRetryable: true,
    })
  }

  static parseFailed(location: string, cause: unknown): RepositoryError {
    return new RepositoryError(`Failed to parse configurations from ${location}`, {
      code: "parse_failed",
      context: { location },
      cause,
      isRetryable: false,
    })
  }

  static readOnly(alias: string): RepositoryError {
    return new RepositoryError("Configuration repository is read-only", {
      code: "read_only",
      context: { alias },
      isRetryable: false,
    })
  }
}

export type ContentLoadErrorCode = "content_not_found" | "content_load_failed"

export class ContentLoadError extends BaseError<ContentLoadErrorCode> {
  static notFound(location: string): ContentLoadError {
    return new ContentLoadError("Configuration content not found", {
      code: "content_not_found",
      context: { location },
      isRetryable: false,
    })
  }

  static loadFailed(location: string, cause: unknown): ContentLoadError {
    return new ContentLoadError("Failed to read configuration content", {
      code: "content_load_failed",
      context: { location },
      cause,
      isRetryable: true,
    })
  }
}

export class ConfigurationError extends BaseError<"invalid_configuration"> {
  static invalid(alias: string, reason: string): ConfigurationError {
    return new ConfigurationError(`Invalid configuration "${alias}": ${reason}`, {
      code: "invalid_configuration",
      context: { alias, reason },
      isRetryable: false,
    })
  }
}

export type ConfigurationParseErrorCode =
  | "malformed_payload"
  | "invalid_payload"
  | "invalid_configuration"

export type PayloadIssue = {
  path: string
  message: string
}

export class ConfigurationParseError extends BaseError<ConfigurationParseErrorCode> {
  static malformed(cause: unknown): ConfigurationParseError {
    return new ConfigurationParseError("Configuration payload is not valid JSON", {
      code: "malformed_payload",
      cause,
      isRetryable: false,
    })
  }

  static invalidPayload(issues: readonly PayloadIssue[]): ConfigurationParseError {
    return new ConfigurationParseError("Configuration payload does not match the schema", {
      code: "invalid_payload",
      context: { issues },
      isRetryable: false,
    })
  }

  static invalidConfiguration(index: number, cause: ConfigurationError): ConfigurationParseError {
    return new ConfigurationParseError(cause.message, {
      code: "invalid_configuration",
      context: { index, ...cause.context },
      cause,
      isRetryable: false,
    })
  }
}

export class DuplicateContextParameterError extends BaseError<"duplicate_context_parameter"> {
  static forParameter(parameter: string): DuplicateContextParameterError {
    return new DuplicateContextParameterError(
      `Context parameter "${parameter}" is supplied more than once`,
      {
        code: "duplicate_context_parameter",
        context: { parameter },
        isRetryable: false,
      },
    )
  }
}
