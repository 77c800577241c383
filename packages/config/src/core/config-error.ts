import { BaseError, type ErrorContext } from "@cloudbucket/errors"

export type ConfigErrorCode = "config_invalid"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static invalid(details: string, context: ErrorContext = {}): ConfigError {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context,
      isRetryable: false,
    })
  }
}
