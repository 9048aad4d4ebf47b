/**
 * Error taxonomy for talking to the model server.
 */

/** Upper bound on how much of a response body a RemoteError keeps. */
export const MAX_ERROR_BODY = 500;

export class ExplorerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * DNS, connect, timeout or abort failure: no HTTP status was received.
 */
export class TransportError extends ExplorerError {
  readonly endpoint: string;

  constructor(endpoint: string, cause: unknown) {
    super(`Request to ${endpoint} failed: ${describeCause(cause)}`, { cause });
    this.endpoint = endpoint;
  }
}

/**
 * The server answered with a status >= 400, or with a body that is not the JSON we asked for.
 */
export class RemoteError extends ExplorerError {
  readonly endpoint: string;
  readonly status: number;
  readonly body: string;

  constructor(endpoint: string, status: number, body: string, reason?: string) {
    const truncated = truncateBody(body);
    super(reason ?? `API returned status ${status} for ${endpoint}: ${truncated.slice(0, 200)}`);
    this.endpoint = endpoint;
    this.status = status;
    this.body = truncated;
  }
}

/**
 * Navigation to an element that is not cached and could not be fetched.
 */
export class ElementNotFoundError extends ExplorerError {
  readonly elementId: string;

  constructor(elementId: string, cause?: unknown) {
    super(`Element not found: ${elementId}`, { cause });
    this.elementId = elementId;
  }
}

export class CredentialsError extends ExplorerError {}

export class ConfigError extends ExplorerError {}

export function truncateBody(body: string): string {
  return body.length > MAX_ERROR_BODY ? body.slice(0, MAX_ERROR_BODY) : body;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    // fetch wraps the socket error one level down
    if (cause.cause instanceof Error) return `${cause.message} (${cause.cause.message})`;
    return cause.message;
  }
  return String(cause);
}
