// CHANGE: Application orchestration from argv to ExitCode
// PURITY: APP (no process.exit; output through the injected Reporter)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: every DriverError is reported exactly once and maps to exit code 1
// COMPLEXITY: O(n) where n = |argv|

import { Effect } from "effect";
import { match } from "ts-pattern";

import {
	buildLinkConfiguration,
	DEFAULT_TARGET_TRIPLE,
} from "../core/config/build.js";
import { EXIT_FAILURE, EXIT_SUCCESS } from "../core/decision.js";
import { resolveLinkerCommand } from "../core/engine/arguments.js";
import type { DriverConfigError, DriverError } from "../core/errors.js";
import { formatDriverError } from "../core/format/messages.js";
import { renderHelp, renderVersion } from "../core/format/usage.js";
import type { ExitCode } from "../core/models.js";
import { parseArguments } from "../core/options/parse.js";
import { resolveOutputPath } from "../core/output/resolve.js";
import { planInputs } from "../core/plan/merge.js";
import type {
	DriverConfig,
	EngineSettings,
	LinkEngine,
	LinkOptions,
	ParsedCommand,
} from "../core/types/index.js";
import type { Reporter } from "../shell/output/printer.js";
import { invokeLink } from "./invokeLink.js";

/**
 * Everything the driver needs from its surroundings.
 */
export interface DriverEnvironment {
	readonly cwd: () => string;
	readonly loadDriverConfig: Effect.Effect<DriverConfig, DriverConfigError>;
	readonly createEngine: (settings: EngineSettings) => LinkEngine;
	readonly reporter: Reporter;
}

const tripleOf = (driverConfig: DriverConfig): string =>
	driverConfig.targetTriple ?? DEFAULT_TARGET_TRIPLE;

/**
 * Resolve output, build configuration, plan inputs and invoke the engine.
 *
 * @effect Effect<void, DriverError>
 */
function linkProgram(
	options: LinkOptions,
	env: DriverEnvironment,
): Effect.Effect<void, DriverError> {
	return Effect.gen(function* () {
		const driverConfig = yield* env.loadDriverConfig;

		const target = yield* resolveOutputPath(
			options.output,
			options.objectFiles.map((file) => file.value),
			env.cwd,
		);
		if (target.warning !== undefined) env.reporter.warn(target.warning);

		const config = buildLinkConfiguration(options, target.path, {
			targetTriple: tripleOf(driverConfig),
		});
		const plan = planInputs(options.objectFiles, options.nameSpecs);
		const engine = env.createEngine({
			command: resolveLinkerCommand(driverConfig.linker, config.targetTriple),
		});

		yield* invokeLink(engine, config, target.path, plan);
	});
}

/**
 * Runs one driver invocation and returns the exit code as a value.
 *
 * @param args - Arguments without the program name
 * @param env - Injected collaborators
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @invariant ExitCode ∈ {0,1}
 * @postcondition --help/--version never create an engine
 */
export function runDriver(
	args: ReadonlyArray<string>,
	env: DriverEnvironment,
): Effect.Effect<ExitCode> {
	const program = Effect.gen(function* () {
		const command = yield* parseArguments(args);
		yield* match<ParsedCommand, Effect.Effect<void, DriverError>>(command)
			.with({ kind: "help" }, () =>
				Effect.sync(() => env.reporter.info(renderHelp())),
			)
			.with({ kind: "version" }, (version) =>
				env.loadDriverConfig.pipe(
					Effect.map((driverConfig) =>
						env.reporter.info(
							renderVersion(version.targetTriple ?? tripleOf(driverConfig)),
						),
					),
				),
			)
			.with({ kind: "link" }, ({ options }) => linkProgram(options, env))
			.exhaustive();
		return EXIT_SUCCESS;
	});

	return program.pipe(
		Effect.catchAll((error: DriverError) =>
			Effect.sync(() => {
				env.reporter.error(formatDriverError(error));
				return EXIT_FAILURE;
			}),
		),
	);
}
