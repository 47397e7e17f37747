/**
 * Thrown when the on-disk structure of an image is malformed or uses
 * an encoding that is not supported (compressed, color-mapped, interleaved,
 * or an unknown bit depth).
 */
export class FormatError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'FormatError';
	}
}

/**
 * Thrown when a caller passes an invalid value, such as an unsupported
 * creation spec or a row of the wrong length.
 */
export class ArgumentError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ArgumentError';
	}
}

/**
 * Thrown when a row index falls outside `[0, height)`.
 */
export class RowRangeError extends RangeError {
	constructor(public readonly y: number, public readonly height: number) {
		super(`y-coordinate ${y} out of range. Image has ${height} rows`);
		this.name = 'RowRangeError';
	}
}

/** Thrown by any operation on a closed image or stream. */
export class UseAfterCloseError extends Error {
	constructor(what: string) {
		super(`${what} is closed`);
		this.name = 'UseAfterCloseError';
	}
}

// * Synchronous code can only hit this re-entrantly, from inside a guarded callback
export class StreamBusyError extends Error {
	constructor() {
		super('Stream is already in use');
		this.name = 'StreamBusyError';
	}
}
