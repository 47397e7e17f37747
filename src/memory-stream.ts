import { UseAfterCloseError } from '@/errors';
import type { SeekableStream } from '@/seekable-stream';

/**
 * A growable in-memory {@link SeekableStream}.
 *
 * Writing past the end zero-fills the gap. The contents stay
 * available through {@link bytes} after the stream is closed.
 */
export default class MemoryStream implements SeekableStream {
	private buffer: Buffer;
	private length: number;
	private isClosed = false;
	public pos: number;

	/**
	 * @param initial - Starting contents. Copied, so the caller's buffer is never written to.
	 */
	constructor(initial?: Buffer) {
		this.buffer = Buffer.from(initial ?? Buffer.alloc(0));
		this.length = this.buffer.length;
		this.pos = 0;
	}

	private assertOpen(): void {
		if (this.isClosed) {
			throw new UseAfterCloseError('Memory stream');
		}
	}

	/**
	 * Ensures the buffer can hold `needed` bytes
	 * @param needed - Total number of bytes needed
	 */
	private ensureCapacity(needed: number): void {
		if (needed > this.buffer.length) {
			const newBuffer = Buffer.alloc(Math.max(needed, Math.floor(this.buffer.length * 1.5)));

			this.buffer.copy(newBuffer);
			this.buffer = newBuffer;
		}
	}

	/**
	 * Gets the stream contents
	 * @returns A copy of every byte written so far
	 */
	public bytes(): Buffer {
		return Buffer.from(this.buffer.subarray(0, this.length));
	}

	public seek(position: number): void {
		this.assertOpen();
		this.pos = position;
	}

	public read(length: number): Buffer {
		this.assertOpen();

		const end = Math.min(this.pos + length, this.length);
		const read = Buffer.from(this.buffer.subarray(Math.min(this.pos, end), end));

		this.pos += read.length;

		return read;
	}

	public write(bytes: Buffer): void {
		this.assertOpen();
		this.ensureCapacity(this.pos + bytes.length);

		bytes.copy(this.buffer, this.pos);
		this.pos += bytes.length;
		this.length = Math.max(this.length, this.pos);
	}

	public close(): void {
		this.assertOpen();
		this.isClosed = true;
	}
}
