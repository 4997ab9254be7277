import { CoreError } from "../rpc/errors.js";
import { AuthorizationPolicy } from "./policy.js";
import {
  CAPABILITY_PROFILES_ORDER,
  type CapabilityProfile,
  DEFAULT_PROFILE,
  isCapabilityProfile,
  profileRank,
} from "./profiles.js";

/**
 * Caller lanes. `legacy` covers local clients that predate origins, `kagan`
 * the embedded agent bridge, `kagan_admin` external admin tooling and `tui`
 * the interactive terminal UI.
 */
export const SESSION_ORIGINS = ["legacy", "kagan", "kagan_admin", "tui"] as const;
export type SessionOrigin = (typeof SESSION_ORIGINS)[number];

export const SESSION_NAMESPACES = ["default", "task", "planner", "ext", "tui"] as const;
export type SessionNamespace = (typeof SESSION_NAMESPACES)[number];

/** Namespaces that carry a scope after the `<namespace>:` prefix. */
const SCOPED_NAMESPACES: ReadonlySet<SessionNamespace> = new Set(["task", "planner", "ext", "tui"]);

interface OriginLane {
  /** Highest profile the lane may bind; higher requests are clamped. */
  ceiling: CapabilityProfile;
  namespaces: ReadonlySet<SessionNamespace>;
  /** Whether the client must report the exact core version. */
  versionChecked: boolean;
}

const ORIGIN_LANES: Readonly<Record<SessionOrigin, OriginLane>> = {
  legacy: { ceiling: "maintainer", namespaces: new Set(["default", "task", "planner", "ext"]), versionChecked: false },
  kagan: { ceiling: "pair_worker", namespaces: new Set(["default", "task", "planner"]), versionChecked: true },
  kagan_admin: { ceiling: "maintainer", namespaces: new Set(["ext"]), versionChecked: true },
  tui: { ceiling: "maintainer", namespaces: new Set(["tui"]), versionChecked: false },
};

/** Session ids shaped like `ABC-123` predate namespaces and are task scoped. */
const LEGACY_TASK_ID = /^[A-Z]+-\d+$/;

/** Immutable authorization context of one session. */
export interface SessionBinding {
  readonly policy: AuthorizationPolicy;
  readonly origin: SessionOrigin;
  readonly namespace: SessionNamespace;
  readonly scopeId: string;
}

/** Subset of the request envelope consulted while binding. */
export interface BindingRequest {
  sessionId: string;
  sessionProfile?: string;
  sessionOrigin?: string;
}

export function originRequiresVersionCheck(origin: SessionOrigin): boolean {
  return ORIGIN_LANES[origin].versionChecked;
}

function normaliseProfile(profile: string): CapabilityProfile {
  if (!isCapabilityProfile(profile)) {
    throw new CoreError(
      "INVALID_PROFILE",
      `Unknown capability profile '${profile}'. Valid profiles: ${CAPABILITY_PROFILES_ORDER.join(", ")}`,
    );
  }
  return profile;
}

/** Blank or missing origins fall back to `legacy`. */
export function normaliseOrigin(origin: string | undefined): SessionOrigin {
  const normalised = origin?.trim().toLowerCase() ?? "";
  if (normalised.length === 0) {
    return "legacy";
  }
  const match = SESSION_ORIGINS.find((candidate) => candidate === normalised);
  if (!match) {
    throw new CoreError(
      "INVALID_ORIGIN",
      `Unknown session origin '${origin}'. Valid origins: ${[...SESSION_ORIGINS].sort().join(", ")}`,
    );
  }
  return match;
}

/** Splits `task:T-1` style ids; unknown prefixes keep the whole id in `default`. */
export function parseSessionScope(sessionId: string): { namespace: SessionNamespace; scopeId: string } {
  const separator = sessionId.indexOf(":");
  if (separator > 0) {
    const prefix = sessionId.slice(0, separator);
    const scope = sessionId.slice(separator + 1);
    const namespace = SESSION_NAMESPACES.find((candidate) => candidate === prefix);
    if (namespace && SCOPED_NAMESPACES.has(namespace) && scope.length > 0) {
      return { namespace, scopeId: scope };
    }
  }
  if (LEGACY_TASK_ID.test(sessionId)) {
    return { namespace: "task", scopeId: sessionId };
  }
  return { namespace: "default", scopeId: sessionId };
}

function clampProfile(requested: CapabilityProfile, ceiling: CapabilityProfile): CapabilityProfile {
  return profileRank(requested) <= profileRank(ceiling) ? requested : ceiling;
}

/**
 * Owner of the session bindings. The first request of a session fixes its
 * profile and origin; later requests may repeat them but never change them.
 */
export class SessionBindings {
  private readonly bindings = new Map<string, SessionBinding>();

  /** Explicit registration used by trusted local callers; binds on the legacy lane. */
  register(sessionId: string, profile: string): SessionBinding {
    const { namespace, scopeId } = parseSessionScope(sessionId);
    const binding: SessionBinding = Object.freeze({
      policy: new AuthorizationPolicy(normaliseProfile(profile)),
      origin: "legacy",
      namespace,
      scopeId,
    });
    this.bindings.set(sessionId, binding);
    return binding;
  }

  /** Removes the binding; the session is treated as unseen afterwards. */
  unregister(sessionId: string): void {
    this.bindings.delete(sessionId);
  }

  peek(sessionId: string): SessionBinding | undefined {
    return this.bindings.get(sessionId);
  }

  size(): number {
    return this.bindings.size;
  }

  resolve(request: BindingRequest): SessionBinding {
    const existing = this.bindings.get(request.sessionId);
    if (existing) {
      this.assertCompatible(request, existing);
      return existing;
    }

    const origin = normaliseOrigin(request.sessionOrigin);
    const lane = ORIGIN_LANES[origin];
    const requested = normaliseProfile(request.sessionProfile ?? DEFAULT_PROFILE);
    const { namespace, scopeId } = parseSessionScope(request.sessionId);
    if (!lane.namespaces.has(namespace)) {
      const allowed = [...lane.namespaces].sort().join(", ");
      throw new CoreError(
        "SESSION_NAMESPACE_DENIED",
        `Origin '${origin}' is not authorized for session namespace '${namespace}'. Allowed namespaces: ${allowed}`,
      );
    }

    const binding: SessionBinding = Object.freeze({
      policy: new AuthorizationPolicy(clampProfile(requested, lane.ceiling)),
      origin,
      namespace,
      scopeId,
    });
    this.bindings.set(request.sessionId, binding);
    return binding;
  }

  private assertCompatible(request: BindingRequest, existing: SessionBinding): void {
    if (request.sessionProfile) {
      const requested = normaliseProfile(request.sessionProfile);
      if (requested !== existing.policy.profile) {
        throw new CoreError(
          "INVALID_PROFILE",
          `Session '${request.sessionId}' is already bound to profile '${existing.policy.profile}', cannot switch to '${request.sessionProfile}'`,
        );
      }
    }
    if (request.sessionOrigin && request.sessionOrigin.trim().length > 0) {
      const requestedOrigin = normaliseOrigin(request.sessionOrigin);
      if (requestedOrigin !== existing.origin) {
        throw new CoreError(
          "SESSION_ORIGIN_MISMATCH",
          `Session '${request.sessionId}' is already bound to origin '${existing.origin}', cannot switch to '${requestedOrigin}'`,
        );
      }
    }
  }
}
