import StreamIn from '@/stream-in';
import StreamOut from '@/stream-out';
import GuardedStream from '@/guarded-stream';
import { ArgumentError, FormatError, RowRangeError, UseAfterCloseError } from '@/errors';
import { getLogger } from '@/logger';
import type { SeekableStream } from '@/seekable-stream';
import type { Origin, ResolvedSpec } from '@/tga-header';
import type { PixelFormat, RGB, RGBA } from '@/formats';

const logger = getLogger('targa-rows');

/**
 * Everything needed to create an image laid out like an existing one.
 */
export type ImageSpec = {
	width: number;
	height: number;
	colorDepth: number;
	hasAlpha: boolean;
	origin: Origin;
};

/**
 * An open TGA image, read and written one row at a time.
 *
 * Row 0 is always the top row of the picture, whichever order
 * the rows are stored in on disk.
 *
 * Use `openTGA` or `createTGA` rather than constructing this directly.
 */
export default class TGAImage {
	private stream: GuardedStream;
	public readonly width: number;
	public readonly height: number;
	public readonly bitsPerPixel: number;
	public readonly colorDepth: number;
	public readonly alphaDepth: number;
	public readonly origin: Origin;
	public readonly bytesPerPixel: number;
	public readonly bytesPerRow: number;
	private readonly imageDataOffset: number;

	/**
	 * @param stream - The stream holding the image. Owned by the image from here on.
	 * @param resolved - Values derived from the image header.
	 * @param format - The pixel format matching `resolved`.
	 */
	constructor(stream: SeekableStream, resolved: ResolvedSpec, public readonly format: PixelFormat) {
		this.stream = new GuardedStream(stream);
		this.width = resolved.width;
		this.height = resolved.height;
		this.bitsPerPixel = resolved.bitsPerPixel;
		this.colorDepth = resolved.colorDepth;
		this.alphaDepth = resolved.alphaDepth;
		this.origin = resolved.origin;
		this.imageDataOffset = resolved.imageDataOffset;
		this.bytesPerPixel = format.bytesPerPixel;
		this.bytesPerRow = format.bytesPerPixel * resolved.width;
	}

	public get hasAlpha(): boolean {
		return this.format.hasAlpha;
	}

	public get closed(): boolean {
		return this.stream.closed;
	}

	private assertOpen(): void {
		if (this.stream.closed) {
			throw new UseAfterCloseError('Image');
		}
	}

	/**
	 * Gets a spec that `createTGA` accepts to make an image with the same layout.
	 */
	public spec(): ImageSpec {
		this.assertOpen();

		return {
			width: this.width,
			height: this.height,
			// * Padded 24 bit pixels are recreated unpadded, 32 bit color depth has no creatable layout
			colorDepth: this.format.kind === 'Format24' ? 24 : this.colorDepth,
			hasAlpha: this.hasAlpha,
			origin: this.origin
		};
	}

	/**
	 * Computes where a row is stored.
	 *
	 * @param y - Row index, 0 being the top row.
	 * @returns The byte offset of the row from the start of the stream.
	 * @throws {RowRangeError} If `y` is not an integer in `[0, height)`.
	 */
	public rowOffset(y: number): number {
		if (!Number.isInteger(y) || y < 0 || y >= this.height) {
			throw new RowRangeError(y, this.height);
		}

		// * Flip the vertical axis when (0, 0) is in the lower-left corner of the image
		if (this.origin === 'LOWER_LEFT') {
			y = (this.height - 1) - y;
		}

		return this.imageDataOffset + this.bytesPerRow * y;
	}

	/**
	 * Reads the raw bytes of a row. You probably want {@link getRowRGB} or {@link getRowRGBA} instead.
	 *
	 * @throws {FormatError} If the stream ends before the row does.
	 */
	public readRowBytes(y: number): Buffer {
		const offset = this.rowOffset(y);
		const bytes = this.stream.use(stream => {
			stream.seek(offset);
			return stream.read(this.bytesPerRow);
		});

		if (bytes.length !== this.bytesPerRow) {
			throw new FormatError(`Row ${y} is truncated. Expected ${this.bytesPerRow} bytes, got ${bytes.length}`);
		}

		return bytes;
	}

	/**
	 * Replaces the raw bytes of a row. You probably want {@link putRowRGB} or {@link putRowRGBA} instead.
	 *
	 * @throws {ArgumentError} If `bytes` is not exactly one row long.
	 */
	public writeRowBytes(y: number, bytes: Buffer): void {
		if (bytes.length !== this.bytesPerRow) {
			throw new ArgumentError(`Got ${bytes.length} bytes of row data, expected ${this.bytesPerRow}`);
		}

		const offset = this.rowOffset(y);

		this.stream.use(stream => {
			stream.seek(offset);
			stream.write(bytes);
		});
	}

	/**
	 * Reads a row as packed colors in the layout of {@link format}.
	 */
	public getRow(y: number): number[] {
		const stream = new StreamIn(this.readRowBytes(y));
		const row: number[] = [];

		for (let x = 0; x < this.width; x++) {
			row.push(this.format.readColor(stream));
		}

		return row;
	}

	/**
	 * Writes a row of packed colors in the layout of {@link format}.
	 */
	public putRow(y: number, colors: readonly number[]): void {
		if (colors.length !== this.width) {
			throw new ArgumentError(`Got a row of ${colors.length} pixels, expected ${this.width}`);
		}

		const stream = new StreamOut(this.bytesPerRow);

		for (const color of colors) {
			this.format.writeColor(stream, color);
		}

		this.writeRowBytes(y, stream.bytes());
	}

	/**
	 * Reads a row as `[r, g, b]` values between 0 and 255.
	 */
	public getRowRGB(y: number): RGB[] {
		return this.getRow(y).map(color => this.format.rgbFromColor(color));
	}

	/**
	 * Reads a row as `[r, g, b, a]` values between 0 and 255.
	 * Images without alpha read back fully opaque.
	 */
	public getRowRGBA(y: number): RGBA[] {
		return this.getRow(y).map(color => this.format.rgbaFromColor(color));
	}

	/**
	 * Replaces a row with `[r, g, b]` values between 0 and 255.
	 * Images with alpha are written fully opaque.
	 */
	public putRowRGB(y: number, row: readonly RGB[]): void {
		this.putRow(y, row.map(([r, g, b]) => this.format.colorFromRGB(r, g, b)));
	}

	/**
	 * Replaces a row with `[r, g, b, a]` values between 0 and 255.
	 * Alpha is dropped for images without it.
	 */
	public putRowRGBA(y: number, row: readonly RGBA[]): void {
		this.putRow(y, row.map(([r, g, b, a]) => this.format.colorFromRGBA(r, g, b, a)));
	}

	/**
	 * Iterates over every row from the top as `[row, y]` pairs of `[r, g, b]` values.
	 * Rows are read as the iterator advances, and each call starts over at row 0.
	 */
	public eachRowRGB(): IterableIterator<[RGB[], number]> {
		this.assertOpen();

		return this.rows(y => this.getRowRGB(y));
	}

	/**
	 * Iterates over every row from the top as `[row, y]` pairs of `[r, g, b, a]` values.
	 * Rows are read as the iterator advances, and each call starts over at row 0.
	 */
	public eachRowRGBA(): IterableIterator<[RGBA[], number]> {
		this.assertOpen();

		return this.rows(y => this.getRowRGBA(y));
	}

	private *rows<T>(read: (y: number) => T): IterableIterator<[T, number]> {
		for (let y = 0; y < this.height; y++) {
			yield [read(y), y];
		}
	}

	/**
	 * Closes the underlying stream. Every later call on this image throws.
	 * Do not close an image while another call on it is still running.
	 */
	public close(): void {
		this.stream.close();
		logger.debug(`Closed ${this.width}x${this.height} image`);
	}
}
