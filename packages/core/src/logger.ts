/**
 * Minimal logging sink accepted by the decoder
 */
export interface RuntimeDataLogger {
	warn(message: string): void;
	debug?(message: string): void;
}

/** Logger that writes warnings to the console with an `[rdat]` prefix */
export const consoleLogger: RuntimeDataLogger = {
	warn(message) {
		console.warn(`[rdat] ${message}`);
	},
};

/** Logger that drops everything */
export const silentLogger: RuntimeDataLogger = {
	warn() {},
};
