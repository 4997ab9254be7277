export * from "./types.js";
export * from "./ports.js";
export * from "./rpc/errors.js";
export * from "./rpc/contracts.js";
export * from "./config/settings.js";
export { EventBus, EventStream, MERGE_EVENT_KINDS } from "./events/bus.js";
export type { EventCategory, EventEnvelope, EventFilter, EventInput, EventLevel } from "./events/bus.js";
export { StructuredLogger } from "./logger.js";
export type { LogEntry, LogLevel, LoggerOptions } from "./logger.js";
export { RuntimeRegistry, isViewBlocked, isViewPending, isViewRunning } from "./runtime/registry.js";
export type { BlockedDetails, RuntimeTaskPhase, RuntimeTaskView } from "./runtime/registry.js";
export { AUTO_OUTPUT_MESSAGES, AutoOutputCoordinator } from "./runtime/autoOutput.js";
export type { AutoOutputMode, AutoOutputReadiness, AutoOutputRecoveryResult } from "./runtime/autoOutput.js";
export { RegistryAutomationService } from "./runtime/automation.js";
export type { AgentLaunchHooks, AgentLauncher } from "./runtime/automation.js";
export { KeyedLocks, ProcessLock } from "./runtime/taskLocks.js";
export { OperationAbortedError } from "./runtime/timers.js";
export { MERGE_SUCCESS_MESSAGES, MergeCoordinator, QUIESCENCE_TIMEOUT_MESSAGE } from "./merge/coordinator.js";
export type { MergeOutcome, MergeRecord, MergeResult } from "./merge/types.js";
export { AuthorizationPolicy } from "./auth/policy.js";
export { CAPABILITY_PROFILES, CAPABILITY_PROFILES_ORDER, PROTOCOL_METHODS } from "./auth/profiles.js";
export type { CapabilityProfile, ProtocolCall } from "./auth/profiles.js";
export { SessionBindings } from "./auth/sessionBinding.js";
export type { SessionBinding, SessionNamespace, SessionOrigin } from "./auth/sessionBinding.js";
export { JobService } from "./jobs/jobService.js";
export type { JobAction, JobRecord, JobStatus } from "./jobs/jobService.js";
export { InMemoryExecutionStore } from "./stores/memoryExecutionStore.js";
export { InMemoryMergeLedger } from "./stores/memoryMergeLedger.js";
export { InMemoryTaskStore } from "./stores/memoryTaskStore.js";
export { CoreHost, createCoreHost } from "./host/coreHost.js";
export type { CoreHostOptions, CreateCoreHostOptions } from "./host/coreHost.js";
export type { DispatchHandler, HostServices } from "./host/dispatchMap.js";
export { createCoreMcpServer } from "./mcp/bridge.js";
export { RecordNotFoundError, TransientStoreError } from "./stores/errors.js";
