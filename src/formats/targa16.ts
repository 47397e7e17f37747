import { translucent } from '@/formats/channels';
import type { RGBA } from '@/formats/channels';
import { colorFrom555, rgbFrom555 } from '@/formats/targa15';

// * 16 bit colors: ARRRRRGG GGGBBBBB, stored little-endian. "A" is a 1 bit alpha

const Format16 = translucent({
	kind: 'Format16',
	bytesPerPixel: 2,
	readColor: stream => stream.readUint16LE(),
	writeColor: (stream, color) => stream.writeUint16LE(color & 0xFFFF)
}, {
	rgbaFromColor(color: number): RGBA {
		const [r, g, b] = rgbFrom555(color);
		const a1 = (color >> 15) & 1;

		return [r, g, b, a1 ? 0xFF : 0];
	},
	colorFromRGBA(r: number, g: number, b: number, a: number): number {
		const a1 = (a >> 7) & 1;

		return (a1 << 15) | colorFrom555(r, g, b);
	}
});

export default Format16;
