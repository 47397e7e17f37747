import fs from 'node:fs';
import { UseAfterCloseError } from '@/errors';
import type { SeekableStream } from '@/seekable-stream';

/**
 * A {@link SeekableStream} over a file descriptor.
 *
 * Uses positional synchronous I/O, so the position lives here
 * rather than in the descriptor.
 */
export default class FileStream implements SeekableStream {
	private fd: number | null;
	public pos: number;

	/**
	 * Opens a file.
	 *
	 * @param path - The file to open.
	 * @param flags - `fs.open` flags, e.g. `'r'`, `'r+'` or `'w+'`.
	 */
	constructor(public readonly path: string, flags: string) {
		this.fd = fs.openSync(path, flags);
		this.pos = 0;
	}

	private descriptor(): number {
		if (this.fd === null) {
			throw new UseAfterCloseError(`File ${this.path}`);
		}

		return this.fd;
	}

	public seek(position: number): void {
		this.descriptor();
		this.pos = position;
	}

	public read(length: number): Buffer {
		const fd = this.descriptor();
		const buffer = Buffer.alloc(length);
		let total = 0;

		// * readSync may return short counts before the end of the file
		while (total < length) {
			const count = fs.readSync(fd, buffer, total, length - total, this.pos + total);

			if (count === 0) {
				break;
			}

			total += count;
		}

		this.pos += total;

		return buffer.subarray(0, total);
	}

	public write(bytes: Buffer): void {
		const fd = this.descriptor();
		let total = 0;

		while (total < bytes.length) {
			total += fs.writeSync(fd, bytes, total, bytes.length - total, this.pos + total);
		}

		this.pos += total;
	}

	public close(): void {
		const fd = this.descriptor();

		this.fd = null;
		fs.closeSync(fd);
	}
}
