export type ErrorKind =
  | "NotAuthenticated"
  | "AccessDenied"
  | "NotFound"
  | "NetworkOrThrottling"
  | "Unknown";

export class ResourceError extends Error {
  readonly kind: ErrorKind;
  readonly status?: number;

  constructor(kind: ErrorKind, message: string, status?: number) {
    super(message);
    this.name = "ResourceError";
    this.kind = kind;
    this.status = status;
  }
}

/** Failure raised for a non-2xx REST response. */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

/** Failure raised when an `az` invocation exits non-zero. */
export class CommandError extends Error {
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string) {
    super(`${command} failed: ${stderr.trim() || `exit code ${exitCode}`}`);
    this.name = "CommandError";
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

const NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
]);

export function kindForStatus(status: number): ErrorKind {
  if (status === 401) return "NotAuthenticated";
  if (status === 403) return "AccessDenied";
  if (status === 404) return "NotFound";
  if (status === 408 || status === 429 || status >= 500) {
    return "NetworkOrThrottling";
  }
  return "Unknown";
}

function kindForText(text: string): ErrorKind {
  if (/az login|AADSTS|not logged in|InvalidAuthenticationToken/i.test(text)) {
    return "NotAuthenticated";
  }
  if (/AuthorizationFailed|Forbidden|does not have .* permission/i.test(text)) {
    return "AccessDenied";
  }
  if (/ResourceNotFound|SecretNotFound|was not found|could not be found/i.test(text)) {
    return "NotFound";
  }
  if (/TooManyRequests|throttl|timed out/i.test(text)) {
    return "NetworkOrThrottling";
  }
  return "Unknown";
}

function errorCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

/**
 * Map any failure from a collaborator onto the error taxonomy. HTTP statuses
 * win over message text; unrecognised failures are `Unknown`.
 */
export function classifyError(err: unknown): ResourceError {
  if (err instanceof ResourceError) return err;

  if (err instanceof HttpError) {
    return new ResourceError(kindForStatus(err.status), err.message, err.status);
  }

  if (err instanceof CommandError) {
    return new ResourceError(kindForText(err.stderr), err.message);
  }

  if (err instanceof Error) {
    const code = errorCode(err);
    if (code && (NETWORK_CODES.has(code) || code.startsWith("UND_ERR"))) {
      return new ResourceError("NetworkOrThrottling", err.message);
    }
    return new ResourceError(kindForText(err.message), err.message);
  }

  return new ResourceError("Unknown", String(err));
}

/** Human-readable line for a classified error, as shown at the failing level. */
export function describeError(error: ResourceError): string {
  switch (error.kind) {
    case "NotAuthenticated":
      return `Not signed in: ${error.message}. Run: az login`;
    case "AccessDenied":
      return `Access denied: ${error.message}`;
    case "NotFound":
      return `Not found: ${error.message}`;
    case "NetworkOrThrottling":
      return `Network error or throttled: ${error.message}`;
    default:
      return error.message;
  }
}
