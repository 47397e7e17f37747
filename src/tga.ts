import FileStream from '@/file-stream';
import TGAHeader from '@/tga-header';
import TGAImage from '@/tga-image';
import { ArgumentError } from '@/errors';
import { getLogger } from '@/logger';
import { layoutForSpec, selectPixelFormat } from '@/formats';
import { isSeekableStream } from '@/seekable-stream';
import type { ImageSpec } from '@/tga-image';
import type { SeekableStream } from '@/seekable-stream';

const logger = getLogger('targa-rows');

export const VERSION = '0.1.0';

/**
 * The spec passed to {@link createTGA}.
 *
 * `colorDepth` does not count alpha bits. The supported combinations are
 * 15 with alpha, 16 without, 24 without and 24 with.
 * `hasAlpha` defaults to `false` and `origin` to `'UPPER_LEFT'`.
 * `origin` only changes the layout on disk, row 0 is always the top row.
 */
export type CreateSpec = Pick<ImageSpec, 'width' | 'height' | 'colorDepth'> & Partial<Pick<ImageSpec, 'hasAlpha' | 'origin'>>;

export type OpenOptions = {
	writable?: boolean; // * Open paths with 'r+' rather than 'r'
};

/**
 * Opens an existing TGA image.
 *
 * @param source - A path, or a stream positioned anywhere. The image takes ownership of the stream.
 * @param options - Only used when `source` is a path.
 * @throws {FormatError} If the image is not an uncompressed, unmapped, non-interleaved RGB or RGBA TGA.
 */
export function openTGA(source: string | SeekableStream, options: OpenOptions = {}): TGAImage {
	if (typeof source !== 'string') {
		return openStream(assertStream(source));
	}

	const stream = new FileStream(source, options.writable ? 'r+' : 'r');

	try {
		return openStream(stream);
	} catch (error) {
		stream.close();
		throw error;
	}
}

function assertStream(value: SeekableStream): SeekableStream {
	if (!isSeekableStream(value)) {
		throw new ArgumentError('Expected a path or a stream with seek, read, write and close methods');
	}

	return value;
}

function openStream(stream: SeekableStream): TGAImage {
	stream.seek(0);

	const header = TGAHeader.decode(stream.read(TGAHeader.Length));
	const resolved = header.resolve();
	const format = selectPixelFormat(resolved.bitsPerPixel, resolved.alphaDepth);

	logger.debug(`Opened ${resolved.width}x${resolved.height} image. ${resolved.bitsPerPixel} bpp, ${resolved.alphaDepth}-bit alpha, ${resolved.origin}`);

	return new TGAImage(stream, resolved, format);
}

/**
 * Creates a TGA image and opens it for reading and writing.
 *
 * Only the header is written. Every row should be written with one of
 * the `putRow` methods before the image is read back.
 *
 * @param destination - A path, truncated if it exists, or a stream. The image takes ownership of the stream.
 * @throws {ArgumentError} If the spec is not supported.
 */
export function createTGA(destination: string | SeekableStream, spec: CreateSpec): TGAImage {
	const { width, height, colorDepth, hasAlpha = false, origin = 'UPPER_LEFT' } = spec;
	const { bitsPerPixel, alphaDepth } = layoutForSpec(colorDepth, hasAlpha);

	let imageDescriptor = alphaDepth;

	if (origin === 'UPPER_LEFT') {
		imageDescriptor |= TGAHeader.DescriptorBits.TopToBottom;
	} else if (origin !== 'LOWER_LEFT') {
		throw new ArgumentError(`Got invalid origin. Expected UPPER_LEFT or LOWER_LEFT. Got ${String(origin)}`);
	}

	// * Encoded before the destination is touched, so a bad width or height leaves no file behind
	const rawHeader = TGAHeader.encode({ width, height, pixelDensity: bitsPerPixel, imageDescriptor });

	logger.debug(`Creating ${width}x${height} image. ${bitsPerPixel} bpp, ${alphaDepth}-bit alpha, ${origin}`);

	if (typeof destination !== 'string') {
		return writeAndOpen(assertStream(destination), rawHeader);
	}

	const stream = new FileStream(destination, 'w+');

	try {
		return writeAndOpen(stream, rawHeader);
	} catch (error) {
		stream.close();
		throw error;
	}
}

// * Reading back what was just written keeps the create and open layouts identical
function writeAndOpen(stream: SeekableStream, rawHeader: Buffer): TGAImage {
	stream.seek(0);
	stream.write(rawHeader);
	stream.seek(0);

	return openStream(stream);
}
