// Caller passed a configuration outside what the generator accepts. Raised before any work starts.
export class InvalidConfigurationError extends Error {
  constructor(
    readonly field: string,
    readonly value: unknown,
    message: string
  ) {
    super(`invalid ${field} (${String(value)}): ${message}`);
    this.name = "InvalidConfigurationError";
  }
}

// Broken mesh bookkeeping. Always a bug, never recoverable.
export class GeometryInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GeometryInvariantError";
  }
}
