import { StreamBusyError, UseAfterCloseError } from '@/errors';
import type { SeekableStream } from '@/seekable-stream';

/**
 * Owns a {@link SeekableStream} together with its exclusive-access guard.
 *
 * A seek followed by a read or write is not atomic, so every access goes
 * through {@link use}, which holds the guard for the whole callback.
 */
export default class GuardedStream {
	private stream: SeekableStream | null;
	private held = false;

	constructor(stream: SeekableStream) {
		this.stream = stream;
	}

	public get closed(): boolean {
		return this.stream === null;
	}

	/**
	 * Runs `fn` with exclusive access to the stream.
	 *
	 * @param fn - Receives the stream. Its return value is passed through.
	 * @throws {UseAfterCloseError} If the stream was closed.
	 * @throws {StreamBusyError} If called from inside another `use` on this stream.
	 */
	public use<T>(fn: (stream: SeekableStream) => T): T {
		if (this.stream === null) {
			throw new UseAfterCloseError('Image');
		}

		if (this.held) {
			throw new StreamBusyError();
		}

		this.held = true;

		try {
			return fn(this.stream);
		} finally {
			this.held = false;
		}
	}

	/**
	 * Closes the underlying stream. The guard is released even if closing throws.
	 */
	public close(): void {
		this.use(stream => {
			this.stream = null;
			stream.close();
		});
	}
}
