/**
 * A class for writing little-endian binary data to a Buffer
 */
export default class StreamOut {
	private buffer: Buffer;
	public pos: number;

	/**
	 * Creates a new StreamOut instance
	 * @param size - Initial capacity in bytes. The buffer grows past it as needed
	 */
	constructor(size?: number) {
		this.buffer = Buffer.alloc(size || 0);
		this.pos = 0;
	}

	/**
	 * Ensures the buffer has enough capacity for the given length
	 * @param length - Number of bytes needed
	 */
	private ensureCapacity(length: number): void {
		const needed = this.pos + length;

		if (needed > this.buffer.length) {
			// * Give the buffer some extra room when growing. This takes up a bit more
			// * memory, but reduces the overall number of capacity increases
			const newSize = Math.max(needed, Math.floor(this.buffer.length * 1.5));
			this.grow(newSize);
		}
	}

	/**
	 * Replaces the buffer with a larger one, keeping its contents
	 * @param length - New size of the buffer in bytes
	 */
	private grow(length: number): void {
		const newBuffer = Buffer.alloc(length);

		this.buffer.copy(newBuffer);
		this.buffer = newBuffer;
	}

	/**
	 * Gets the current buffer (trimmed to actual written size)
	 * @returns The buffer containing written data
	 */
	public bytes(): Buffer {
		return this.buffer.subarray(0, this.pos);
	}

	/**
	 * Writes an unsigned 8-bit integer
	 * @param uint8 - The value to write
	 */
	public writeUint8(uint8: number): void {
		this.ensureCapacity(1);
		this.buffer.writeUint8(uint8, this.pos);
		this.pos += 1;
	}

	/**
	 * Writes an unsigned 16-bit integer in little-endian format
	 * @param uint16 - The value to write
	 */
	public writeUint16LE(uint16: number): void {
		this.ensureCapacity(2);
		this.buffer.writeUint16LE(uint16, this.pos);
		this.pos += 2;
	}

	/**
	 * Writes the low 3 bytes of an unsigned 32-bit integer in little-endian format
	 * @param uint24 - The value to write
	 */
	public writeUint24LE(uint24: number): void {
		this.ensureCapacity(3);
		this.buffer.writeUintLE(uint24 & 0xFFFFFF, this.pos, 3);
		this.pos += 3;
	}

	/**
	 * Writes an unsigned 32-bit integer in little-endian format
	 * @param uint32 - The value to write
	 */
	public writeUint32LE(uint32: number): void {
		this.ensureCapacity(4);
		this.buffer.writeUint32LE(uint32, this.pos);
		this.pos += 4;
	}
}
