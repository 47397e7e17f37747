import Format15 from '@/formats/targa15';
import Format16 from '@/formats/targa16';
import Format32 from '@/formats/targa32';
import { targa24 } from '@/formats/targa24';
import { ArgumentError, FormatError } from '@/errors';
import type { Format24 } from '@/formats/targa24';

export type { Format24 } from '@/formats/targa24';
export type { PixelFormatKind, RGB, RGBA } from '@/formats/channels';

export type PixelFormat = typeof Format15 | typeof Format16 | Format24 | typeof Format32;

export type PixelLayoutSpec = {
	bitsPerPixel: number;
	alphaDepth: number;
};

const Format24Packed = targa24(3);
const Format24Padded = targa24(4);

/**
 * Picks the pixel format for a decoded header.
 *
 * @param bitsPerPixel - Bits stored per pixel, including alpha.
 * @param alphaDepth - Alpha bits per pixel, from the image descriptor.
 * @throws {FormatError} If the combination is not supported.
 */
export function selectPixelFormat(bitsPerPixel: number, alphaDepth: number): PixelFormat {
	switch (`${bitsPerPixel}/${alphaDepth}`) {
		case '16/0':
			return Format15;
		case '16/1':
			return Format16;
		case '24/0':
			return Format24Packed;
		case '32/0':
			return Format24Padded;
		case '32/8':
			return Format32;
		default:
			throw new FormatError(`${bitsPerPixel} bpp with ${alphaDepth}-bit alpha channel not supported`);
	}
}

/**
 * Maps the color depth and alpha flag of a creation spec to
 * the header values that store it.
 *
 * @param colorDepth - Color bits per pixel, not counting alpha.
 * @throws {ArgumentError} If the combination is not supported.
 */
export function layoutForSpec(colorDepth: number, hasAlpha: boolean): PixelLayoutSpec {
	switch (`${colorDepth}/${hasAlpha}`) {
		case '15/true':
			return { bitsPerPixel: 16, alphaDepth: 1 };
		case '16/false':
			return { bitsPerPixel: 16, alphaDepth: 0 };
		case '24/false':
			return { bitsPerPixel: 24, alphaDepth: 0 };
		case '24/true':
			return { bitsPerPixel: 32, alphaDepth: 8 };
		default:
			throw new ArgumentError(`Color depth ${colorDepth} with hasAlpha=${hasAlpha} not supported`);
	}
}
