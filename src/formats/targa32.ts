import { translucent } from '@/formats/channels';
import type { RGBA } from '@/formats/channels';

// * 32 bit colors, stored as BGRA bytes

const Format32 = translucent({
	kind: 'Format32',
	bytesPerPixel: 4,
	readColor: stream => stream.readUint32LE(),
	writeColor: (stream, color) => stream.writeUint32LE(color)
}, {
	rgbaFromColor(color: number): RGBA {
		return [(color >> 16) & 0xFF, (color >> 8) & 0xFF, color & 0xFF, (color >>> 24) & 0xFF];
	},
	colorFromRGBA(r: number, g: number, b: number, a: number): number {
		// * >>> 0 keeps colors with the top alpha bit set positive
		return (((a & 0xFF) << 24) | ((r & 0xFF) << 16) | ((g & 0xFF) << 8) | (b & 0xFF)) >>> 0;
	}
});

export default Format32;
