// CHANGE: Immutable link configuration and driver configuration types
// PURITY: CORE
// INVARIANT: A LinkConfiguration is deep-frozen once built

/**
 * Kind of artifact the link produces.
 */
export type OutputKind = "Executable" | "SharedLibrary";

/**
 * Configuration handed to the link engine.
 *
 * @property soname Internal name of a shared library; defaults to the output path
 * @property searchDirs User directories in order, then the two fixed defaults
 * @property symbolic Bind references within the shared library
 */
export interface LinkConfiguration {
	readonly targetTriple: string;
	readonly soname: string;
	readonly sysroot?: string;
	readonly dynamicLinker?: string;
	readonly wrapSymbols: ReadonlyArray<string>;
	readonly portableSymbols: ReadonlyArray<string>;
	readonly searchDirs: ReadonlyArray<string>;
	readonly outputKind: OutputKind;
	readonly symbolic: boolean;
}

/**
 * Settings read from linkplan.config.json.
 *
 * @property linker Program the external engine runs
 * @property targetTriple Triple used when -mtriple is not given
 */
export interface DriverConfig {
	readonly linker?: string;
	readonly targetTriple?: string;
}

/**
 * Output path chosen for the link, with an optional diagnostic line.
 */
export interface OutputResolution {
	readonly path: string;
	readonly warning?: string;
}
