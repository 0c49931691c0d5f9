// CHANGE: Pure helpers the ld-compatible engine uses to search and render arguments
// PURITY: CORE
// INVARIANT: renderLinkerArguments is deterministic in (config, output, inputs)
// COMPLEXITY: O(n) in the number of configuration entries and inputs

import * as path from "node:path";

import { DEFAULT_SEARCH_DIRS, DEFAULT_TARGET_TRIPLE } from "../config/build.js";
import type { LinkConfiguration } from "../types/index.js";

/**
 * Maps a search directory to the directory actually scanned.
 *
 * `=dir` is relative to the sysroot. `isDefault` marks one of the fixed
 * directories appended by the configuration builder; only those are
 * rebased onto the sysroot, never a user `-L` with the same text.
 *
 * @pure true
 *
 * @example
 * ```ts
 * expandSearchDir("=/opt/lib", "/sdk", false); // "/sdk/opt/lib"
 * expandSearchDir("/usr/lib", "/sdk", true);   // "/sdk/usr/lib"
 * expandSearchDir("/usr/lib", "/sdk", false);  // "/usr/lib"
 * ```
 */
export function expandSearchDir(
	dir: string,
	sysroot: string | undefined,
	isDefault: boolean,
): string {
	if (dir.startsWith("=")) {
		const rest = dir.slice(1);
		return sysroot === undefined ? rest : path.join(sysroot, rest);
	}
	if (sysroot !== undefined && isDefault) return path.join(sysroot, dir);
	return dir;
}

/**
 * Expands every configured search directory in order.
 *
 * @pure true
 * @invariant the last |DEFAULT_SEARCH_DIRS| entries are the fixed defaults
 */
export function expandSearchDirs(
	config: LinkConfiguration,
): ReadonlyArray<string> {
	const firstDefault = config.searchDirs.length - DEFAULT_SEARCH_DIRS.length;
	return config.searchDirs.map((dir, index) =>
		expandSearchDir(dir, config.sysroot, index >= firstDefault),
	);
}

/**
 * File names a namespec may resolve to, in preference order.
 *
 * @pure true
 * @postcondition name starts with ":" → [name without ":"]
 */
export function namespecCandidates(name: string): ReadonlyArray<string> {
	if (name.startsWith(":")) return [name.slice(1)];
	return [`lib${name}.so`, `lib${name}.a`];
}

/**
 * Removes repeated entries, keeping the first occurrence.
 *
 * @pure true
 */
export function uniqueInOrder(items: ReadonlyArray<string>): ReadonlyArray<string> {
	return [...new Set(items)];
}

/**
 * Program name for the external linker.
 *
 * @param configured - `linker` from linkplan.config.json
 * @param targetTriple - Triple of the link
 *
 * @pure true
 * @postcondition configured given → configured
 */
export function resolveLinkerCommand(
	configured: string | undefined,
	targetTriple: string,
): string {
	if (configured !== undefined && configured.length > 0) return configured;
	return targetTriple === DEFAULT_TARGET_TRIPLE ? "ld" : `${targetTriple}-ld`;
}

/**
 * Renders the argument list for an ld-compatible program.
 *
 * @param config - Link configuration
 * @param output - Output path
 * @param inputs - Resolved input paths in plan order
 *
 * @pure true
 * @invariant inputs appear last, in the given order
 */
export function renderLinkerArguments(
	config: LinkConfiguration,
	output: string,
	inputs: ReadonlyArray<string>,
): ReadonlyArray<string> {
	const args: string[] = [];
	if (config.sysroot !== undefined) args.push(`--sysroot=${config.sysroot}`);
	args.push("-o", output);
	if (config.outputKind === "SharedLibrary") {
		args.push("-shared", "-soname", config.soname);
		if (config.symbolic) args.push("-Bsymbolic");
	}
	if (config.dynamicLinker !== undefined) {
		args.push(`--dynamic-linker=${config.dynamicLinker}`);
	}
	for (const symbol of uniqueInOrder(config.wrapSymbols)) {
		args.push(`--wrap=${symbol}`);
	}
	for (const dir of expandSearchDirs(config)) {
		args.push(`-L${dir}`);
	}
	args.push(...inputs);
	return args;
}
