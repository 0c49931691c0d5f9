// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or APP orchestration

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run one invocation against an injected environment.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { nodeEnvironment, runDriver } from "linkplan";
 *
 * const code = await Effect.runPromise(
 *   runDriver(["main.o", "-lm", "-o", "prog"], nodeEnvironment),
 * );
 * ```
 */
export { type DriverEnvironment, runDriver } from "./app/runDriver.js";
export { type InvokeError, invokeLink, registerInput } from "./app/invokeLink.js";
export { main, nodeEnvironment } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type { ExitCode } from "./core/models.js";
export type {
	DriverConfig,
	EngineSettings,
	InputItem,
	LinkConfiguration,
	LinkEngine,
	LinkOptions,
	OrderedInputPlan,
	OutputKind,
	OutputResolution,
	ParsedCommand,
	PositionedValue,
} from "./core/types/index.js";
export {
	ConfigurationError,
	type DriverError,
	DriverConfigError,
	EngineFailure,
	FileOpenError,
	InputResolutionError,
	LinkEngineError,
	OutputResolutionError,
	UsageError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode } from "./core/decision.js";
export { parseArguments } from "./core/options/parse.js";
export { DEFAULT_OUTPUT_NAME, resolveOutputPath } from "./core/output/resolve.js";
export {
	buildLinkConfiguration,
	DEFAULT_SEARCH_DIRS,
	DEFAULT_TARGET_TRIPLE,
} from "./core/config/build.js";
export { planInputs } from "./core/plan/merge.js";
export { renderLinkerArguments } from "./core/engine/arguments.js";
export { formatDriverError } from "./core/format/messages.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export { createLdEngine, type LdEngineSettings } from "./shell/engine/index.js";
