import axios from "axios";

export class IdLocError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IdLocError";
  }
}

/** A transport failure, a non-2xx response, or a body in the wrong format. */
export class RemoteServiceError extends IdLocError {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, url: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RemoteServiceError";
    this.url = url;
    this.status = status;
  }
}

export class UnknownConceptSchemeError extends IdLocError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Concept scheme name(s) don't exist: ${missing.join(", ")}`);
    this.name = "UnknownConceptSchemeError";
    this.missing = missing;
  }
}

export class FramingError extends IdLocError {
  readonly uri: string;

  constructor(message: string, uri: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FramingError";
    this.uri = uri;
  }
}

/** Wrap an axios (or any) failure for `url` in a RemoteServiceError. */
export function toRemoteServiceError(err: unknown, url: string): RemoteServiceError {
  if (err instanceof RemoteServiceError) return err;
  if (axios.isAxiosError(err)) {
    const status = err.response?.status ?? null;
    const detail = status != null
      ? `HTTP ${status}${err.response?.statusText ? ` ${err.response.statusText}` : ""}`
      : err.code ?? err.message;
    return new RemoteServiceError(`Request to ${url} failed: ${detail}`, url, status, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new RemoteServiceError(`Request to ${url} failed: ${message}`, url, null, { cause: err });
}
