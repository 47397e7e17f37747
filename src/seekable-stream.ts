/**
 * A byte stream with a movable position, the storage behind an image.
 *
 * Reads and writes start at the current position and advance it.
 * `read` may return fewer bytes than asked for at the end of the data.
 */
export interface SeekableStream {
	seek(position: number): void;
	read(length: number): Buffer;
	write(bytes: Buffer): void;
	close(): void;
}

/**
 * Checks whether a value implements {@link SeekableStream}.
 *
 * @param value - A path or a stream.
 */
export function isSeekableStream(value: unknown): value is SeekableStream {
	if (typeof value !== 'object' || value === null) {
		return false;
	}

	return ['seek', 'read', 'write', 'close'].every(method => typeof Reflect.get(value, method) === 'function');
}
