// CHANGE: Help and version text
// PURITY: CORE

export const DRIVER_NAME = "linkplan";
export const DRIVER_VERSION = "0.1.0";

const USAGE_LINES: ReadonlyArray<string> = [
	`USAGE: ${DRIVER_NAME} [options] <input object files>`,
	"",
	"OPTIONS:",
	"  -o <filename>              Output filename",
	"  -l<namespec>               Add the archive or object file found by namespec",
	"  -L<searchdir>              Add searchdir to the library search path",
	"  --sysroot <directory>      Use directory as the location of the sysroot",
	"  --soname <name>            Set internal name of shared library",
	"  --shared                   Create a shared library",
	"  --Bsymbolic[=false]        Bind references within the shared library (default on)",
	"  --dynamic-linker <program> Set the name of the dynamic linker",
	"  --wrap <symbol>            Use a wrap function for symbol",
	"  --portable <symbol>        Use a portable function for symbol",
	"  -mtriple <triple>, -C      Target triple",
	"  --help, -h                 Display this help",
	"  --version                  Display the version",
];

/**
 * @pure true
 */
export const renderHelp = (): string => USAGE_LINES.join("\n");

/**
 * @pure true
 *
 * @example
 * ```ts
 * renderVersion("aarch64-linux-gnu");
 * // "linkplan 0.1.0\n  Default target: aarch64-linux-gnu"
 * ```
 */
export const renderVersion = (targetTriple: string): string =>
	`${DRIVER_NAME} ${DRIVER_VERSION}\n  Default target: ${targetTriple}`;
