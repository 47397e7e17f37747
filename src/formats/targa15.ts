import { narrow5, opaque, widen5 } from '@/formats/channels';
import type { RGB } from '@/formats/channels';

// * 15 bit colors: xRRRRRGG GGGBBBBB, stored little-endian. The top bit is unused

/**
 * Splits the 5-5-5 color bits of a 15 or 16 bit color into 8 bit channels.
 */
export function rgbFrom555(color: number): RGB {
	return [
		widen5((color >> 10) & 0x1F),
		widen5((color >> 5) & 0x1F),
		widen5(color & 0x1F)
	];
}

/**
 * Packs 8 bit channels into the 5-5-5 color bits of a 15 or 16 bit color.
 */
export function colorFrom555(r: number, g: number, b: number): number {
	return (narrow5(r) << 10) | (narrow5(g) << 5) | narrow5(b);
}

const Format15 = opaque({
	kind: 'Format15',
	bytesPerPixel: 2,
	readColor: stream => stream.readUint16LE() & 0x7FFF,
	writeColor: (stream, color) => stream.writeUint16LE(color & 0x7FFF)
}, {
	rgbFromColor: rgbFrom555,
	colorFromRGB: colorFrom555
});

export default Format15;
