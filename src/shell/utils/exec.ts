// CHANGE: Run an external program as an Effect with stderr captured as the error detail
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<string, ExecError, never>
// INVARIANT: ∀ run: stdout ∨ ExecError(command, detail ≠ "")
// COMPLEXITY: O(1) time, O(n) space where n = output length

import { execFile } from "node:child_process";
import { promisify } from "node:util";

import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 16 * 1024 * 1024;

/**
 * Runs a program with arguments and returns its stdout.
 */
export type CommandRunner = (
	file: string,
	args: ReadonlyArray<string>,
	options: { readonly cwd?: string },
) => Effect.Effect<string, ExecError>;

/**
 * Extract a readable failure description from a child process error.
 *
 * @pure true
 * @postcondition result.length > 0
 */
export function describeExecFailure(error: unknown): string {
	if (error instanceof Error) {
		if ("stderr" in error && typeof error.stderr === "string") {
			const stderr = error.stderr.trim();
			if (stderr.length > 0) return stderr;
		}
		if (error.message.length > 0) return error.message;
	}
	const text = String(error);
	return text.length > 0 ? text : "unknown failure";
}

/**
 * Execute a program without a shell.
 *
 * @pure false (spawns a child process)
 * @effect Effect<string, ExecError>
 */
export const execFileCommand: CommandRunner = (file, args, options) =>
	Effect.tryPromise({
		try: () =>
			execFileAsync(file, [...args], {
				maxBuffer: MAX_BUFFER,
				...(options.cwd === undefined ? {} : { cwd: options.cwd }),
			}),
		catch: (error) =>
			new ExecError({
				command: [file, ...args].join(" "),
				detail: describeExecFailure(error),
			}),
	}).pipe(Effect.map(({ stdout }) => String(stdout)));
