import { BaseError } from "@cantus/errors"

export class ConfigError extends BaseError<"config_invalid" | "config_unreadable"> {
  static invalid(details: string) {
    return new ConfigError(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      isOperational: false,
    })
  }

  static unreadable(source: string, cause: unknown) {
    return new ConfigError(`Could not read configuration from ${source}`, {
      code: "config_unreadable",
      context: { source },
      cause,
      isOperational: false,
    })
  }
}
