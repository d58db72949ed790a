/** A telemetry payload whose length does not match the fixed frame layout. */
export class FrameLengthError extends Error {
  constructor(
    readonly expected: number,
    readonly actual: number
  ) {
    super(`Telemetry payload length mismatch: expected ${expected}, got ${actual}`);
    this.name = "FrameLengthError";
  }
}

/**
 * Raised to stop ingestion. It is the only error allowed to escape the
 * advertisement callback.
 */
export class CancellationError extends Error {
  constructor(message = "Ingestion cancelled") {
    super(message);
    this.name = "CancellationError";
  }
}

/** A caller broke a documented repository precondition. */
export class RepositoryContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RepositoryContractError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
