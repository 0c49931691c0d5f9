// CHANGE: LinkEngine backed by an ld-compatible program run as a child process
// PURITY: SHELL (filesystem probes, process execution)
// INVARIANT: call order configure → setOutput → add* → link; out-of-order calls fail
// INVARIANT: link() runs the program at most once per engine
// COMPLEXITY: addNameSpec O(|searchDirs| · 2) stat calls

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import {
	expandSearchDirs,
	namespecCandidates,
	renderLinkerArguments,
} from "../../core/engine/arguments.js";
import { EngineFailure } from "../../core/errors.js";
import type { LinkConfiguration, LinkEngine } from "../../core/types/index.js";
import { type CommandRunner, execFileCommand } from "../utils/exec.js";

export interface LdEngineSettings {
	readonly command: string;
	readonly run?: CommandRunner;
	readonly cwd?: string;
}

const fail = (reason: string): Effect.Effect<never, EngineFailure> =>
	Effect.fail(new EngineFailure({ reason }));

const reasonOf = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * stat() that reports absence as undefined instead of throwing.
 */
const probe = (target: string): Effect.Effect<fs.Stats | undefined, EngineFailure> =>
	Effect.try({
		try: () => fs.statSync(target, { throwIfNoEntry: false }),
		catch: (error) => new EngineFailure({ reason: reasonOf(error) }),
	});

/**
 * Creates an engine that validates inputs on disk and links with `command`.
 *
 * @pure false (holds per-invocation state, touches the filesystem)
 *
 * @example
 * ```ts
 * const engine = createLdEngine({ command: "ld" });
 * ```
 */
export function createLdEngine(settings: LdEngineSettings): LinkEngine {
	const run = settings.run ?? execFileCommand;
	const resolvePath = (p: string): string =>
		settings.cwd === undefined ? path.resolve(p) : path.resolve(settings.cwd, p);

	let config: LinkConfiguration | undefined;
	let output: string | undefined;
	let linked = false;
	const inputs: string[] = [];

	const configure = (next: LinkConfiguration): Effect.Effect<void, EngineFailure> =>
		Effect.suspend((): Effect.Effect<void, EngineFailure> => {
			if (config !== undefined) return fail("linker is already configured");
			if (next.portableSymbols.length > 0) {
				return fail(
					`${settings.command} does not support portable symbols (${next.portableSymbols.join(", ")})`,
				);
			}
			config = next;
			return Effect.void;
		});

	const setOutput = (target: string): Effect.Effect<void, EngineFailure> =>
		Effect.gen(function* () {
			if (config === undefined) return yield* fail("linker is not configured");
			const absolute = resolvePath(target);
			yield* Effect.try({
				try: () => fs.accessSync(path.dirname(absolute), fs.constants.W_OK),
				catch: (error) => new EngineFailure({ reason: reasonOf(error) }),
			});
			const existing = yield* probe(absolute);
			if (existing?.isDirectory() === true) return yield* fail("is a directory");
			output = absolute;
		});

	const addObject = (file: string): Effect.Effect<void, EngineFailure> =>
		Effect.gen(function* () {
			if (output === undefined) return yield* fail("output is not set");
			const absolute = resolvePath(file);
			const stats = yield* probe(absolute);
			if (stats === undefined) return yield* fail("No such file or directory");
			if (!stats.isFile()) return yield* fail("not a regular file");
			inputs.push(absolute);
		});

	const addNameSpec = (name: string): Effect.Effect<void, EngineFailure> =>
		Effect.gen(function* () {
			const current = config;
			if (current === undefined || output === undefined) {
				return yield* fail("output is not set");
			}
			for (const dir of expandSearchDirs(current)) {
				const base = resolvePath(dir);
				for (const candidate of namespecCandidates(name)) {
					const full = path.join(base, candidate);
					const stats = yield* probe(full);
					if (stats?.isFile() === true) {
						inputs.push(full);
						return;
					}
				}
			}
			return yield* fail(`unable to find library -l${name}`);
		});

	const link = (): Effect.Effect<void, EngineFailure> =>
		Effect.gen(function* () {
			const current = config;
			const target = output;
			if (current === undefined || target === undefined) {
				return yield* fail("output is not set");
			}
			if (linked) return yield* fail("link already performed");
			linked = true;
			const args = renderLinkerArguments(current, target, inputs);
			yield* run(settings.command, args, {
				...(settings.cwd === undefined ? {} : { cwd: settings.cwd }),
			}).pipe(Effect.mapError((e) => new EngineFailure({ reason: e.detail })));
		});

	return { configure, setOutput, addObject, addNameSpec, link };
}
