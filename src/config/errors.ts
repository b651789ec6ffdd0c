export const CONFIGURATION_ERROR_EXIT_CODE = 2;

export class ConfigurationError extends Error {
  readonly exitCode = CONFIGURATION_ERROR_EXIT_CODE;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
