// CHANGE: Make main.ts a thin APP delegator wiring the real environment
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { type DriverEnvironment, runDriver } from "./app/runDriver.js";
import type { ExitCode } from "./core/models.js";
import { loadDriverConfig } from "./shell/config/loader.js";
import { createLdEngine } from "./shell/engine/index.js";
import { consoleReporter } from "./shell/output/printer.js";

/**
 * Environment backed by the process, the filesystem and an ld-compatible program.
 *
 * @pure false
 */
export const nodeEnvironment: DriverEnvironment = {
	cwd: () => process.cwd(),
	loadDriverConfig: Effect.suspend(() => loadDriverConfig(process.cwd())),
	createEngine: (settings) => createLdEngine({ command: settings.command }),
	reporter: consoleReporter,
};

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns Effect producing ExitCode (0 | 1)
 */
export function main(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Effect.Effect<ExitCode> {
	return runDriver(args, nodeEnvironment);
}
