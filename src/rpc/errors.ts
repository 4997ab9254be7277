import { ZodError } from "zod";

/**
 * Canonical taxonomy of the error codes surfaced by the core host. Each entry
 * carries the default human readable message used when the thrower does not
 * provide a more specific one.
 */
export const CORE_ERROR_TAXONOMY = {
  AUTHORIZATION_DENIED: { message: "Operation not permitted for this profile" },
  INVALID_PROFILE: { message: "Invalid session profile" },
  INVALID_ORIGIN: { message: "Invalid session origin" },
  SESSION_ORIGIN_MISMATCH: { message: "Session origin cannot change once bound" },
  SESSION_NAMESPACE_DENIED: { message: "Session namespace is not allowed for this origin" },
  SESSION_SCOPE_DENIED: { message: "Session is not scoped to the requested task" },
  MCP_OUTDATED: { message: "MCP client version does not match the core version" },
  INVALID_PARAMS: { message: "Invalid params" },
  UNKNOWN_METHOD: { message: "Unknown method" },
  REQUEST_CANCELLED: { message: "Request cancelled before it completed" },
  INTERNAL_ERROR: { message: "Internal error" },
} as const;

/** Union of the supported error codes. */
export type CoreErrorCode = keyof typeof CORE_ERROR_TAXONOMY;

/** Optional knobs enriching a {@link CoreError}. */
export interface CoreErrorOptions {
  hint?: string;
  meta?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for every coded error thrown across the request boundary. The
 * host converts instances into `{ code, message }` payloads; anything else is
 * reported as `INTERNAL_ERROR`.
 */
export class CoreError extends Error {
  readonly code: CoreErrorCode;
  readonly hint?: string;
  readonly meta?: Record<string, unknown>;

  constructor(code: CoreErrorCode, message?: string, options: CoreErrorOptions = {}) {
    super(message ?? CORE_ERROR_TAXONOMY[code].message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CoreError";
    this.code = code;
    this.hint = options.hint;
    this.meta = options.meta;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when a bound profile does not grant the requested pair. */
export class AuthorizationError extends CoreError {
  constructor(profile: string, capability: string, method: string) {
    super("AUTHORIZATION_DENIED", `Profile '${profile}' is not authorized for ${capability}.${method}`, {
      meta: { profile, capability, method },
    });
    this.name = "AuthorizationError";
  }
}

/** Typed surface for payload validation failures. */
export class InvalidParamsError extends CoreError {
  constructor(message?: string, options: CoreErrorOptions = {}) {
    super("INVALID_PARAMS", message, options);
    this.name = "InvalidParamsError";
  }
}

/**
 * Converts a zod failure into an {@link InvalidParamsError}. The first issue
 * becomes the message; every issue path is kept in the metadata.
 */
export function fromZodError(error: ZodError, context: string): InvalidParamsError {
  const [first] = error.issues;
  const location = first && first.path.length > 0 ? first.path.join(".") : "params";
  const detail = first ? `${location}: ${first.message}` : "payload rejected";
  return new InvalidParamsError(`Invalid params for ${context} (${detail})`, {
    hint: "Check the request payload against the method schema.",
    meta: { issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })) },
  });
}

/** Serialised error carried by failed responses. */
export interface CoreErrorPayload {
  code: CoreErrorCode;
  message: string;
  hint?: string;
}

/**
 * Normalises arbitrary thrown values into the wire payload. Zod failures are
 * reported as invalid params, everything that is not a {@link CoreError} as an
 * internal error carrying the original message.
 */
export function toCoreErrorPayload(error: unknown): CoreErrorPayload {
  if (error instanceof CoreError) {
    return {
      code: error.code,
      message: error.message,
      ...(error.hint !== undefined ? { hint: error.hint } : {}),
    };
  }
  if (error instanceof ZodError) {
    return toCoreErrorPayload(fromZodError(error, "request"));
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: "INTERNAL_ERROR", message };
}
