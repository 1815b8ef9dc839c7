/**
 * Raised for invalid environment construction or configuration, before any
 * episode runs. Simulation outcomes (wall hits, observer stops) are values,
 * never errors.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
