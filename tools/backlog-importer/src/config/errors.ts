/**
 * Error thrown when a config file cannot be read or does not match the
 * config schema.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
