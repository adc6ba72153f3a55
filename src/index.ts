// === Types ===
export type {
  CapabilityCategory,
  RiskLevel,
  CapabilityDescriptor,
  CapabilityDescriptorInput,
  CapabilityHandle,
  InvocationContext,
  InvocationStatus,
  InvocationOutcome,
  JobStatus,
  TerminalJobStatus,
  ContextMessage,
  ExecutionContext,
  Job,
  ActionItem,
  JobOutcome,
  AgentTemplate,
  AgentCapability,
  AgentConfig,
  AgentDefinition,
  MessageRole,
  ChatMessage,
  RequestedCall,
  GenerationRequest,
  GenerationResponse,
  TextGenerationBackend,
  RuntimeEventType,
  RuntimeEvent,
  JobSubmittedEvent,
  JobStartedEvent,
  JobCompletedEvent,
  JobFailedEvent,
  JobCancelledEvent,
  CapabilityCalledEvent,
  CapabilityResultEvent,
  CapabilityDeniedEvent,
  AnyRuntimeEvent,
} from "./types/index.js";
export { DEFAULT_AGENT_CONFIG } from "./types/Agent.js";

// === Errors ===
export type { ErrorKind } from "./core/Errors.js";
export {
  RuntimeError,
  createTaggedError,
  errorKindOf,
  describeError,
  DuplicateCapabilityError,
  InvalidAgentDefinitionError,
  InvalidTransitionError,
} from "./core/Errors.js";

// === Invocation gate ===
export { RateWindow } from "./core/RateWindow.js";
export { SchemaValidator, SchemaValidationError, formatValidationErrors } from "./core/SchemaValidator.js";
export type { ValidationResult } from "./core/SchemaValidator.js";
export { InvocationGate } from "./core/InvocationGate.js";
export type { InvocationGateConfig, BatchCall } from "./core/InvocationGate.js";

// === Registries ===
export { CapabilityCatalogue } from "./registry/CapabilityCatalogue.js";
export type { CapabilityListFilter } from "./registry/CapabilityCatalogue.js";
export { InMemoryAgentRegistry, agentDefinitionSchema } from "./registry/AgentRegistry.js";
export type { AgentRegistry } from "./registry/AgentRegistry.js";
export {
  defineCapability,
  createDescriptor,
  registerCapability,
} from "./capabilities/defineCapability.js";
export type { CapabilityDefinition, CapabilityExecutor } from "./capabilities/defineCapability.js";

// === Jobs ===
export { JobLedger } from "./jobs/JobLedger.js";
export type { LedgerEvent } from "./jobs/JobLedger.js";
export { transitionJob, canTransition, isTerminal } from "./jobs/JobStateMachine.js";
export {
  createJob,
  createExecutionContext,
  DEFAULT_JOB_TIMEOUT_SECONDS,
  DEFAULT_MAX_RETRIES,
} from "./jobs/createJob.js";
export type { CreateJobInput } from "./jobs/createJob.js";

// === Orchestration ===
export { ExecutionOrchestrator } from "./orchestrator/ExecutionOrchestrator.js";
export type {
  ExecutionOrchestratorConfig,
  ExecutionOrchestratorOptions,
} from "./orchestrator/ExecutionOrchestrator.js";
export { buildPrompt, renderContextMessage } from "./orchestrator/PromptBuilder.js";
export { extractFollowUps } from "./orchestrator/FollowUpExtractor.js";

// === Agents ===
export {
  SUMMARY_AGENT,
  SUMMARY_ALLOWED_CAPABILITIES,
  createSummaryJob,
} from "./agents/SummaryAgent.js";
export type { SummaryJobInput } from "./agents/SummaryAgent.js";

// === Backend ===
export {
  OpenAICompatibleBackend,
  createOpenAICompatibleBackend,
  parseCompletion,
  toToolDefinition,
} from "./llm/OpenAICompatibleBackend.js";
export type {
  OpenAICompatibleBackendConfig,
  OpenAIToolDefinition,
} from "./llm/OpenAICompatibleBackend.js";

// === Config ===
export {
  loadRuntimeConfig,
  mapRuntimeConfig,
  runtimeConfigSchema,
  DEFAULT_CONFIG_FILE,
} from "./config/RuntimeConfig.js";
export type {
  RuntimeConfig,
  BackendConfig,
  RuntimeConfigLoadResult,
} from "./config/RuntimeConfig.js";

// === Observability ===
export { EventLog } from "./observability/EventLog.js";
export type { LogEntry, EventListener, EventQuery } from "./observability/EventLog.js";
export { Metrics } from "./observability/Metrics.js";
export type { CounterValue, HistogramValue } from "./observability/Metrics.js";
export {
  createLogger,
  resolveDebugOptions,
  sanitizeForLog,
  summarizeForLog,
} from "./observability/Logger.js";
export type {
  LogLevel,
  LogSink,
  DebugOptions,
  ResolvedDebugOptions,
  Logger,
} from "./observability/Logger.js";

// === Runtime ===
export { JobRuntime, createJobRuntime, createJobRuntimeFromConfig } from "./runtime.js";
export type { JobRuntimeOptions } from "./runtime.js";
