/**
 * Error taxonomy shared by the preprocessing and extraction CLIs.
 *
 * ConfigurationError, DecodeError and NetworkError end the run. ParseError is
 * recorded as a note in the results file and the run carries on.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class DecodeError extends Error {
  constructor(
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Could not read image: ${filePath}${reason}`, options);
    this.name = "DecodeError";
  }
}

export class NetworkError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "NetworkError";
  }
}

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly raw: string
  ) {
    super(message);
    this.name = "ParseError";
  }
}
