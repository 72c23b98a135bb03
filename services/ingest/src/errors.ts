/** Invalid or missing invocation settings. Raised before any request is made. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class MetadataParseError extends Error {
  constructor(
    public readonly source: string,
    reason: string,
  ) {
    super(`Invalid ${source}: ${reason}`);
    this.name = "MetadataParseError";
  }
}

/** The RAG engine answered with a non-2xx status. */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly body: string,
  ) {
    super(`HTTP ${status} from ${url}: ${body}`);
    this.name = "HttpError";
  }
}

/** The request never produced a response (refused, reset, DNS, timeout). */
export class NetworkError extends Error {
  constructor(
    public readonly code: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(`Network error (${code}) calling ${url}`, options);
    this.name = "NetworkError";
  }
}

export function isUsageError(error: unknown): boolean {
  return error instanceof ConfigurationError || error instanceof MetadataParseError;
}
