import { opaque } from '@/formats/channels';
import type { PixelFormatOf, RGB } from '@/formats/channels';

export type Format24 = PixelFormatOf<'Format24', false>;

/**
 * 24 bit colors, stored as BGR bytes.
 *
 * 32 bit files with no alpha bits use the same channels with a 4 byte stride.
 * The padding byte is ignored on read and written as 0.
 *
 * @param bytesPerPixel - 3, or 4 for padded pixels.
 */
export function targa24(bytesPerPixel: 3 | 4): Format24 {
	const padding = bytesPerPixel - 3;

	return opaque({
		kind: 'Format24',
		bytesPerPixel,
		readColor(stream) {
			const color = stream.readUint24LE();

			stream.skip(padding);

			return color;
		},
		writeColor(stream, color) {
			stream.writeUint24LE(color);

			for (let i = 0; i < padding; i++) {
				stream.writeUint8(0);
			}
		}
	}, {
		rgbFromColor(color: number): RGB {
			return [(color >> 16) & 0xFF, (color >> 8) & 0xFF, color & 0xFF];
		},
		colorFromRGB(r: number, g: number, b: number): number {
			return ((r & 0xFF) << 16) | ((g & 0xFF) << 8) | (b & 0xFF);
		}
	});
}
