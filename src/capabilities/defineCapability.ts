import type {
  CapabilityDescriptor,
  CapabilityDescriptorInput,
  CapabilityHandle,
  InvocationContext,
} from "../types/Capability.js";
import type { CapabilityCatalogue } from "../registry/CapabilityCatalogue.js";
import { SchemaValidator } from "../core/SchemaValidator.js";

/**
 * Capability body: receives parameters that already passed validation.
 */
export type CapabilityExecutor = (
  parameters: Record<string, unknown>,
  ctx: InvocationContext,
) => unknown | Promise<unknown>;

export interface CapabilityDefinition {
  descriptor: CapabilityDescriptor;
  handle: CapabilityHandle;
}

const sharedValidator = new SchemaValidator();

/**
 * Fill descriptor defaults.
 */
export function createDescriptor(input: CapabilityDescriptorInput): CapabilityDescriptor {
  return {
    name: input.id,
    requiresAuth: false,
    authScopes: [],
    rateWindowSeconds: 60,
    riskLevel: "low",
    isActive: true,
    metadata: {},
    ...input,
  };
}

/**
 * Build a descriptor + handle pair from a plain function.
 * Without an explicit `validate`, parameters are checked against
 * `inputSchema` (on a copy; the caller's payload is left untouched).
 *
 * ```ts
 * const echo = defineCapability({
 *   descriptor: { id: "echo", category: "code", description: "Echo", inputSchema: {...} },
 *   execute: (params) => ({ echoed: params.text }),
 * });
 * catalogue.register(echo.descriptor, echo.handle);
 * ```
 */
export function defineCapability(options: {
  descriptor: CapabilityDescriptorInput;
  execute: CapabilityExecutor;
  validate?: (parameters: Record<string, unknown>) => boolean;
  validator?: SchemaValidator;
}): CapabilityDefinition {
  const descriptor = createDescriptor(options.descriptor);
  const validator = options.validator ?? sharedValidator;
  const validate =
    options.validate ??
    ((parameters: Record<string, unknown>) =>
      validator.check(descriptor.inputSchema, parameters));

  return {
    descriptor,
    handle: {
      validate,
      execute: (parameters, ctx) => options.execute(parameters, ctx),
    },
  };
}

/**
 * Register a defined capability with a catalogue.
 */
export function registerCapability(
  catalogue: CapabilityCatalogue,
  definition: CapabilityDefinition,
): void {
  catalogue.register(definition.descriptor, definition.handle);
}
