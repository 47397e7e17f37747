// * Based on:
// * - https://wikipedia.org/wiki/Truevision_TGA
// * - https://paulbourke.net/dataformats/tga

import StreamIn from '@/stream-in';
import StreamOut from '@/stream-out';
import { ArgumentError, FormatError } from '@/errors';
import { config } from '@/config';

export type Origin = 'UPPER_LEFT' | 'LOWER_LEFT';

/**
 * Values derived once from a decoded header.
 */
export type ResolvedSpec = {
	width: number;
	height: number;
	bitsPerPixel: number;
	alphaDepth: number;
	colorDepth: number;
	origin: Origin;
	imageDataOffset: number; // * Byte offset of the first stored row
};

export type HeaderFields = {
	width: number;
	height: number;
	pixelDensity: number;
	imageDescriptor: number;
};

/**
 * The fixed 18 byte header at the start of every TGA file.
 */
export default class TGAHeader {
	static Length = config.header.length;

	static ColorMapTypes = {
		None:    0, // * No color map
		Present: 1  // * Has a color map
	};

	static ImageTypes = {
		NoData:                  0,  // * No image data is present
		UncompressedColorMapped: 1,  // * Uncompressed color-mapped image
		UncompressedTrueColor:   2,  // * Uncompressed true-color image
		UncompressedGrayscale:   3,  // * Uncompressed grayscale image
		RLEColorMapped:          9,  // * RLE color-mapped image
		RLETrueColor:            10, // * RLE true-color image
		RLEGrayscale:            11  // * RLE grayscale image
	};

	static DescriptorBits = {
		AttributeDepth: 0x0F, // * Bits 3-0 give the number of attribute bits for each pixel (usually alpha)
		RightToLeft:    0x10, // * Bit 4. Ignored, rows are always read left to right
		TopToBottom:    0x20, // * Bit 5. Rows are stored top-to-bottom if set
		Interleave:     0xC0  // * Bits 7-6. Interleaving flag, must be 0
	};

	constructor(
		public readonly idLength: number,
		public readonly colorMapType: number,
		public readonly imageType: number,
		public readonly colorMapSpecification: Readonly<{
			firstEntryIndex: number;
			length: number;
			entrySize: number;
		}>,
		public readonly imageSpecification: Readonly<{
			originX: number;
			originY: number;
			width: number;
			height: number;
			pixelDensity: number;
			imageDescriptor: number;
		}>
	) {}

	/**
	 * Parses and validates a header.
	 *
	 * @param raw - At least the first 18 bytes of a TGA file. Anything after them is ignored.
	 * @throws {FormatError} If the header is truncated, compressed, color-mapped or interleaved.
	 */
	static decode(raw: Buffer): TGAHeader {
		if (raw.length < TGAHeader.Length) {
			throw new FormatError(`Truncated header. Expected ${TGAHeader.Length} bytes, got ${raw.length}`);
		}

		const stream = new StreamIn(raw);

		const idLength = stream.readUint8();
		const colorMapType = stream.readUint8();
		const imageType = stream.readUint8();
		const colorMapSpecification = {
			firstEntryIndex: stream.readUint16LE(),
			length: stream.readUint16LE(),
			entrySize: stream.readUint8()
		};
		const imageSpecification = {
			originX: stream.readUint16LE(),
			originY: stream.readUint16LE(),
			width: stream.readUint16LE(),
			height: stream.readUint16LE(),
			pixelDensity: stream.readUint8(),
			imageDescriptor: stream.readUint8()
		};

		if (imageType !== TGAHeader.ImageTypes.UncompressedTrueColor) {
			throw new FormatError(`Only uncompressed, unmapped RGB or RGBA data is supported (is this a TGA file?). Got image type ${imageType}`);
		}

		if ((imageSpecification.imageDescriptor & TGAHeader.DescriptorBits.Interleave) !== 0) {
			throw new FormatError('Interleaved data not supported');
		}

		return new TGAHeader(idLength, colorMapType, imageType, colorMapSpecification, imageSpecification);
	}

	/**
	 * Encodes a header for an uncompressed true-color image with
	 * no image ID, no color map and a zero origin.
	 *
	 * @throws {ArgumentError} If a field does not fit its on-disk size.
	 */
	static encode(fields: HeaderFields): Buffer {
		TGAHeader.validateField('width', fields.width, 0xFFFF);
		TGAHeader.validateField('height', fields.height, 0xFFFF);
		TGAHeader.validateField('pixel density', fields.pixelDensity, 0xFF);
		TGAHeader.validateField('image descriptor', fields.imageDescriptor, 0xFF);

		const stream = new StreamOut(TGAHeader.Length);

		stream.writeUint8(0); // * Image ID length
		stream.writeUint8(TGAHeader.ColorMapTypes.None);
		stream.writeUint8(config.header.imageType);

		// * Color map specification. First entry index, length, entry size
		stream.writeUint16LE(0);
		stream.writeUint16LE(0);
		stream.writeUint8(0);

		stream.writeUint16LE(0); // * X origin
		stream.writeUint16LE(0); // * Y origin
		stream.writeUint16LE(fields.width);
		stream.writeUint16LE(fields.height);
		stream.writeUint8(fields.pixelDensity);
		stream.writeUint8(fields.imageDescriptor);

		return stream.bytes();
	}

	private static validateField(name: string, value: number, max: number): void {
		if (!Number.isInteger(value) || value < 0 || value > max) {
			throw new ArgumentError(`Got invalid ${name}. Expected an integer between 0 and ${max}. Got ${value}`);
		}
	}

	/**
	 * Derives the values the row I/O needs from the raw header fields.
	 */
	public resolve(): ResolvedSpec {
		const { width, height, pixelDensity, imageDescriptor } = this.imageSpecification;
		const alphaDepth = imageDescriptor & TGAHeader.DescriptorBits.AttributeDepth;

		return {
			width,
			height,
			bitsPerPixel: pixelDensity,
			alphaDepth,
			colorDepth: pixelDensity - alphaDepth,
			origin: (imageDescriptor & TGAHeader.DescriptorBits.TopToBottom) !== 0 ? 'UPPER_LEFT' : 'LOWER_LEFT',
			// * The color map length counts entries and is added as-is
			imageDataOffset: TGAHeader.Length + this.idLength + this.colorMapSpecification.length
		};
	}
}
