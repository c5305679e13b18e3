export type FetchErrorKind =
  | "not_found"
  | "auth"
  | "invalid_username"
  | "transient";

/**
 * Fatal failure of a fetch. `retryable` tells a caller whether asking again
 * later can help (network trouble) or the input must change (unknown user,
 * rejected token).
 */
export abstract class FetchError extends Error {
  abstract readonly kind: FetchErrorKind;
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends FetchError {
  readonly kind = "not_found";
  readonly retryable = false;
}

export class AuthError extends FetchError {
  readonly kind = "auth";
  readonly retryable = false;
}

export class InvalidUsernameError extends FetchError {
  readonly kind = "invalid_username";
  readonly retryable = false;
}

export class TransientError extends FetchError {
  readonly kind = "transient";
  readonly retryable = true;
}

export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err) {
    const { status } = err;
    return typeof status === "number" ? status : undefined;
  }
  return undefined;
}

function isRateLimited(err: unknown): boolean {
  if (typeof err !== "object" || err === null || !("response" in err)) {
    return false;
  }
  const { response } = err;
  if (typeof response !== "object" || response === null || !("headers" in response)) {
    return false;
  }
  const { headers } = response;
  return (
    typeof headers === "object" &&
    headers !== null &&
    "x-ratelimit-remaining" in headers &&
    headers["x-ratelimit-remaining"] === "0"
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Maps a failed remote call onto the fetch error taxonomy. 404 means the
 * entity does not exist; 401 and non-rate-limit 403 mean the credential was
 * refused; anything else (5xx, timeouts, dropped connections) is transient.
 */
export function classifyRequestError(err: unknown, context: string): FetchError {
  if (err instanceof FetchError) return err;

  const status = httpStatusOf(err);
  const detail = `${context}: ${errorMessage(err)}`;

  if (status === 404) {
    return new NotFoundError(detail, status, { cause: err });
  }
  if (status === 401 || (status === 403 && !isRateLimited(err))) {
    return new AuthError(detail, status, { cause: err });
  }
  return new TransientError(detail, status, { cause: err });
}
