// CHANGE: Output path resolution from -o or the positional inputs
// PURITY: CORE (working directory is injected)
// INVARIANT: declared ≠ "" ⇒ result.path = declared
// INVARIANT: |inputs| > 1 ∧ declared = "" ⇒ result.path = "a.out" ∧ warning present
// COMPLEXITY: O(1)

import * as path from "node:path";

import { Either } from "effect";

import { OutputResolutionError } from "../errors.js";
import type { OutputResolution } from "../types/index.js";

export const DEFAULT_OUTPUT_NAME = "a.out";

const errorDetail = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Chooses the output path for the link.
 *
 * @param declared - Value of -o, "" when absent
 * @param inputs - Positional object files in command-line order
 * @param cwd - Working directory lookup; may throw
 *
 * @pure true given a pure cwd
 * @postcondition |inputs| = 1 ∧ declared = "" → dirname(abs(input)) / a.out
 *
 * @example
 * ```ts
 * resolveOutputPath("", ["/tmp/x.o"], () => "/home");
 * // right({ path: "/tmp/a.out" })
 * ```
 */
export function resolveOutputPath(
	declared: string,
	inputs: ReadonlyArray<string>,
	cwd: () => string,
): Either.Either<OutputResolution, OutputResolutionError> {
	if (declared.length > 0) return Either.right({ path: declared });

	if (inputs.length > 1) {
		return Either.right({
			path: DEFAULT_OUTPUT_NAME,
			warning: `Use ${DEFAULT_OUTPUT_NAME} for output file!`,
		});
	}

	const input = inputs[0];
	if (input === undefined) {
		return Either.left(
			new OutputResolutionError({ input: "", detail: "no input files" }),
		);
	}

	return Either.try({
		try: () => {
			const absolute = path.resolve(cwd(), input);
			return { path: path.join(path.dirname(absolute), DEFAULT_OUTPUT_NAME) };
		},
		catch: (error) =>
			new OutputResolutionError({ input, detail: errorDetail(error) }),
	});
}
