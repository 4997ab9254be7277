/**
 * Capability catalogue. Every `capability.method` pair the core understands is
 * listed here, and every profile is a literal tuple of such pairs, so a typo
 * in a profile table is a compile error rather than a silent denial.
 */
export const PROTOCOL_METHODS = {
  tasks: [
    "context",
    "get",
    "list",
    "logs",
    "scratchpad",
    "output",
    "update_scratchpad",
    "recover_output",
    "create",
    "update",
    "move",
    "delete",
  ],
  projects: ["get", "list", "repos", "create", "open"],
  audit: ["list"],
  plan: ["propose"],
  jobs: ["submit", "get", "wait", "events", "cancel"],
  review: ["request", "approve", "reject", "merge", "rebase"],
  sessions: ["create", "attach", "exists", "kill"],
  diagnostics: ["instrumentation"],
  settings: ["get", "update"],
} as const;

export type ProtocolCapability = keyof typeof PROTOCOL_METHODS;

/** Union of every `capability.method` literal, e.g. `"review.merge"`. */
export type ProtocolCall = {
  [C in ProtocolCapability]: `${C}.${(typeof PROTOCOL_METHODS)[C][number]}`;
}[ProtocolCapability];

export const CAPABILITY_PROFILES_ORDER = ["viewer", "planner", "pair_worker", "operator", "maintainer"] as const;
export type CapabilityProfile = (typeof CAPABILITY_PROFILES_ORDER)[number];

export const DEFAULT_PROFILE: CapabilityProfile = "viewer";

/** Read-only queries available to every profile. */
const VIEWER_CALLS = [
  "tasks.context",
  "tasks.get",
  "tasks.list",
  "tasks.logs",
  "tasks.scratchpad",
  "tasks.output",
  "projects.get",
  "projects.list",
  "projects.repos",
  "audit.list",
] as const satisfies readonly ProtocolCall[];

const PLANNER_CALLS = [...VIEWER_CALLS, "plan.propose"] as const satisfies readonly ProtocolCall[];

/** Embedded agents: scratchpad, jobs, review requests and terminal sessions. */
const PAIR_WORKER_CALLS = [
  ...PLANNER_CALLS,
  "tasks.update_scratchpad",
  "tasks.recover_output",
  "jobs.submit",
  "jobs.get",
  "jobs.wait",
  "jobs.events",
  "jobs.cancel",
  "review.request",
  "sessions.create",
  "sessions.attach",
  "sessions.exists",
  "sessions.kill",
] as const satisfies readonly ProtocolCall[];

const OPERATOR_CALLS = [
  ...PAIR_WORKER_CALLS,
  "tasks.create",
  "tasks.update",
  "tasks.move",
  "review.approve",
  "review.reject",
] as const satisfies readonly ProtocolCall[];

const MAINTAINER_CALLS = [
  ...OPERATOR_CALLS,
  "tasks.delete",
  "review.merge",
  "review.rebase",
  "projects.create",
  "projects.open",
  "diagnostics.instrumentation",
  "settings.get",
  "settings.update",
] as const satisfies readonly ProtocolCall[];

export const CAPABILITY_PROFILES: Readonly<Record<CapabilityProfile, ReadonlySet<ProtocolCall>>> = Object.freeze({
  viewer: new Set<ProtocolCall>(VIEWER_CALLS),
  planner: new Set<ProtocolCall>(PLANNER_CALLS),
  pair_worker: new Set<ProtocolCall>(PAIR_WORKER_CALLS),
  operator: new Set<ProtocolCall>(OPERATOR_CALLS),
  maintainer: new Set<ProtocolCall>(MAINTAINER_CALLS),
});

const PROFILE_RANK: Readonly<Record<CapabilityProfile, number>> = {
  viewer: 0,
  planner: 1,
  pair_worker: 2,
  operator: 3,
  maintainer: 4,
};

export function profileRank(profile: CapabilityProfile): number {
  return PROFILE_RANK[profile];
}

export function isCapabilityProfile(value: string): value is CapabilityProfile {
  return CAPABILITY_PROFILES_ORDER.some((profile) => profile === value);
}

/** Builds the canonical `capability.method` key. */
export function protocolCall(capability: string, method: string): string {
  return `${capability}.${method}`;
}

const METHOD_ENTRIES: Array<[string, readonly string[]]> = Object.entries(PROTOCOL_METHODS);
const KNOWN_CALLS = new Set<string>(
  METHOD_ENTRIES.flatMap(([capability, methods]) => methods.map((method) => protocolCall(capability, method))),
);

export function isProtocolCall(value: string): value is ProtocolCall {
  return KNOWN_CALLS.has(value);
}

/** Pairs that at least one profile grants explicitly. */
export function isRegisteredCall(call: string): boolean {
  return CAPABILITY_PROFILES_ORDER.some((profile) => isProtocolCall(call) && CAPABILITY_PROFILES[profile].has(call));
}
