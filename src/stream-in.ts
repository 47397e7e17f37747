import { FormatError } from '@/errors';

/**
 * A class for reading little-endian binary data from a Buffer
 */
export default class StreamIn {
	private buffer: Buffer;
	public pos: number;

	/**
	 * Creates a new StreamIn instance
	 * @param buffer - The buffer to read from
	 */
	constructor(buffer: Buffer) {
		this.buffer = buffer;
		this.pos = 0;
	}

	/**
	 * Skips the specified number of bytes
	 * @param length - Number of bytes to skip
	 */
	public skip(length: number): void {
		this.readBytes(length);
	}

	/**
	 * Reads the specified number of bytes
	 * @param length - Number of bytes to read
	 * @returns A view of the read bytes
	 * @throws {FormatError} If fewer than `length` bytes remain
	 */
	public readBytes(length: number): Buffer {
		const remaining = this.buffer.length - this.pos;

		if (length > remaining) {
			throw new FormatError(`Unexpected end of data. Wanted ${length} bytes at offset ${this.pos}, ${remaining} left`);
		}

		const read = this.buffer.subarray(this.pos, this.pos + length);
		this.pos += length;

		return read;
	}

	/**
	 * Reads an unsigned 8-bit integer
	 * @returns The read value
	 */
	public readUint8(): number {
		return this.readBytes(1).readUint8();
	}

	/**
	 * Reads an unsigned 16-bit integer in little-endian format
	 * @returns The read value
	 */
	public readUint16LE(): number {
		return this.readBytes(2).readUint16LE();
	}

	/**
	 * Reads an unsigned 24-bit integer in little-endian format.
	 * This is the low 3 bytes of a little-endian 32-bit value
	 * @returns The read value
	 */
	public readUint24LE(): number {
		return this.readBytes(3).readUintLE(0, 3);
	}

	/**
	 * Reads an unsigned 32-bit integer in little-endian format
	 * @returns The read value
	 */
	public readUint32LE(): number {
		return this.readBytes(4).readUint32LE();
	}
}
