export type {
  CapabilityCategory,
  RiskLevel,
  CapabilityDescriptor,
  CapabilityDescriptorInput,
  CapabilityHandle,
  InvocationContext,
} from "./Capability.js";

export type { InvocationStatus, InvocationOutcome } from "./Outcome.js";

export type {
  JobStatus,
  TerminalJobStatus,
  ContextMessage,
  ExecutionContext,
  Job,
  ActionItem,
  JobOutcome,
} from "./Job.js";

export type {
  AgentTemplate,
  AgentCapability,
  AgentConfig,
  AgentDefinition,
} from "./Agent.js";

export type {
  MessageRole,
  ChatMessage,
  RequestedCall,
  GenerationRequest,
  GenerationResponse,
  TextGenerationBackend,
} from "./Backend.js";

export type {
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
} from "./Events.js";
