// CHANGE: Single place where the driver writes to stdout/stderr
// PURITY: SHELL (console I/O)
// INVARIANT: diagnostics → stderr, help/version → stdout

/**
 * Output sink used by the app layer.
 */
export interface Reporter {
	readonly info: (text: string) => void;
	readonly warn: (text: string) => void;
	readonly error: (text: string) => void;
}

/**
 * Reporter backed by the process console.
 *
 * @pure false (console output)
 */
export const consoleReporter: Reporter = {
	info: (text) => {
		console.log(text);
	},
	warn: (text) => {
		console.error(`⚠️  ${text}`);
	},
	error: (text) => {
		console.error(`❌ ${text}`);
	},
};
