// CHANGE: Render every DriverError as one diagnostic line
// PURITY: CORE
// INVARIANT: exhaustive over DriverError["_tag"]
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { DriverError } from "../errors.js";

/**
 * Formats an error for the diagnostic stream.
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatDriverError(new LinkEngineError({ detail: "undefined symbol: main" }));
 * // "Failed to link (detail: undefined symbol: main)"
 * ```
 */
export const formatDriverError = (error: DriverError): string =>
	match(error)
		.with(
			{ _tag: "UsageError" },
			(e) => `Invalid invocation: ${e.detail} (see --help)`,
		)
		.with(
			{ _tag: "DriverConfigError" },
			(e) =>
				`Failed to load the driver configuration (detail: ${e.path}: ${e.detail})`,
		)
		.with(
			{ _tag: "OutputResolutionError" },
			(e) =>
				`Failed to determine the absolute path of '${e.input}' (detail: ${e.detail})`,
		)
		.with(
			{ _tag: "ConfigurationError" },
			(e) => `Failed to configure the linker (detail: ${e.detail})`,
		)
		.with(
			{ _tag: "FileOpenError" },
			(e) => `Failed to open the output file (detail: ${e.path}: ${e.detail})`,
		)
		.with(
			{ _tag: "InputResolutionError", kind: "object" },
			(e) => `Failed to open the input file (detail: ${e.item}: ${e.detail})`,
		)
		.with(
			{ _tag: "InputResolutionError", kind: "namespec" },
			(e) => `Failed to open the namespec (detail: -l${e.item}: ${e.detail})`,
		)
		.with(
			{ _tag: "LinkEngineError" },
			(e) => `Failed to link (detail: ${e.detail})`,
		)
		.exhaustive();
