// CHANGE: Build the immutable LinkConfiguration from validated options
// PURITY: CORE
// INVARIANT: searchDirs = options.searchDirs ++ DEFAULT_SEARCH_DIRS
// INVARIANT: build(o, p, d) deep-equals build(o, p, d) (no time or env input)
// COMPLEXITY: O(n) where n = |wrap| + |portable| + |searchDirs|

import type {
	LinkConfiguration,
	LinkOptions,
	OutputKind,
} from "../types/index.js";

/**
 * System library directories searched after every -L directory.
 */
export const DEFAULT_SEARCH_DIRS: ReadonlyArray<string> = Object.freeze([
	"/lib",
	"/usr/lib",
]);

export const DEFAULT_TARGET_TRIPLE = "x86_64-unknown-linux-gnu";

/**
 * Values not carried by the command line.
 */
export interface ConfigurationDefaults {
	readonly targetTriple: string;
}

const frozenList = (items: ReadonlyArray<string>): ReadonlyArray<string> =>
	Object.freeze([...items]);

/**
 * Translates options into the configuration the engine consumes.
 *
 * Steps: soname, sysroot, dynamic linker, wrap symbols, portable symbols,
 * search directories, output kind, symbolic binding.
 *
 * @param options - Parsed options
 * @param outputPath - Resolved output path (soname fallback)
 * @param defaults - Triple used when -mtriple is absent
 *
 * @pure true
 * @postcondition result is frozen, arrays included
 */
export function buildLinkConfiguration(
	options: LinkOptions,
	outputPath: string,
	defaults: ConfigurationDefaults,
): LinkConfiguration {
	const outputKind: OutputKind = options.shared ? "SharedLibrary" : "Executable";
	const base: LinkConfiguration = {
		targetTriple: options.targetTriple ?? defaults.targetTriple,
		soname: options.soname.length > 0 ? options.soname : outputPath,
		wrapSymbols: frozenList(options.wrapSymbols),
		portableSymbols: frozenList(options.portableSymbols),
		searchDirs: frozenList([...options.searchDirs, ...DEFAULT_SEARCH_DIRS]),
		outputKind,
		symbolic: options.symbolic,
	};
	const withSysroot: LinkConfiguration =
		options.sysroot.length > 0 ? { ...base, sysroot: options.sysroot } : base;
	const config: LinkConfiguration =
		options.dynamicLinker.length > 0
			? { ...withSysroot, dynamicLinker: options.dynamicLinker }
			: withSysroot;
	return Object.freeze(config);
}
