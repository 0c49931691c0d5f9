// CHANGE: Typed error ADT for every failure the driver can report
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Malformed invocation: unknown flag, missing value, no input files.
 *
 * @invariant detail.length > 0
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
	readonly flag?: string;
}> {}

/**
 * linkplan.config.json exists but cannot be read or does not validate.
 */
export class DriverConfigError extends Data.TaggedError("DriverConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * The output path could not be derived from the single input file.
 *
 * @invariant input is the positional argument that was being resolved
 */
export class OutputResolutionError extends Data.TaggedError(
	"OutputResolutionError",
)<{
	readonly input: string;
	readonly detail: string;
}> {}

/**
 * The engine rejected the link configuration.
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
	readonly detail: string;
}> {}

/**
 * The output file cannot be opened or created.
 */
export class FileOpenError extends Data.TaggedError("FileOpenError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Kind of input that failed registration.
 */
export type InputKind = "object" | "namespec";

/**
 * A single object file or namespec could not be registered.
 *
 * @invariant position ≥ 1 (command-line position of the failing item)
 */
export class InputResolutionError extends Data.TaggedError(
	"InputResolutionError",
)<{
	readonly kind: InputKind;
	readonly item: string;
	readonly position: number;
	readonly detail: string;
}> {}

/**
 * The link step itself failed; detail is the engine's own text.
 */
export class LinkEngineError extends Data.TaggedError("LinkEngineError")<{
	readonly detail: string;
}> {}

/**
 * Failure reported by a LinkEngine operation, before the invoker
 * classifies it by the step that produced it.
 */
export class EngineFailure extends Data.TaggedError("EngineFailure")<{
	readonly reason: string;
}> {}

/**
 * Child process execution error.
 *
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Every error that reaches the user.
 */
export type DriverError =
	| UsageError
	| DriverConfigError
	| OutputResolutionError
	| ConfigurationError
	| FileOpenError
	| InputResolutionError
	| LinkEngineError;
