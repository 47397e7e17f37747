import type StreamIn from '@/stream-in';
import type StreamOut from '@/stream-out';

export type RGB = [number, number, number];
export type RGBA = [number, number, number, number];

export type PixelFormatKind = 'Format15' | 'Format16' | 'Format24' | 'Format32';

/**
 * How one packed color is stored on disk.
 */
export interface PixelLayout<K extends PixelFormatKind> {
	readonly kind: K;
	readonly bytesPerPixel: number;
	readColor(stream: StreamIn): number;
	writeColor(stream: StreamOut, color: number): void;
}

export interface OpaqueChannels {
	rgbFromColor(color: number): RGB;
	colorFromRGB(r: number, g: number, b: number): number;
}

export interface TranslucentChannels {
	rgbaFromColor(color: number): RGBA;
	colorFromRGBA(r: number, g: number, b: number, a: number): number;
}

export type PixelFormatOf<K extends PixelFormatKind, A extends boolean> = PixelLayout<K> & OpaqueChannels & TranslucentChannels & {
	readonly hasAlpha: A;
};

/**
 * Completes a format with no alpha channel. Alpha reads back as
 * fully opaque and is dropped on write.
 */
export function opaque<K extends PixelFormatKind>(layout: PixelLayout<K>, channels: OpaqueChannels): PixelFormatOf<K, false> {
	return {
		...layout,
		...channels,
		hasAlpha: false,
		rgbaFromColor(color: number): RGBA {
			const [r, g, b] = channels.rgbFromColor(color);

			return [r, g, b, 0xFF];
		},
		colorFromRGBA(r: number, g: number, b: number): number {
			return channels.colorFromRGB(r, g, b);
		}
	};
}

/**
 * Completes a format with an alpha channel. RGB reads drop alpha
 * and RGB writes store it fully opaque.
 */
export function translucent<K extends PixelFormatKind>(layout: PixelLayout<K>, channels: TranslucentChannels): PixelFormatOf<K, true> {
	return {
		...layout,
		...channels,
		hasAlpha: true,
		rgbFromColor(color: number): RGB {
			const [r, g, b] = channels.rgbaFromColor(color);

			return [r, g, b];
		},
		colorFromRGB(r: number, g: number, b: number): number {
			return channels.colorFromRGBA(r, g, b, 0xFF);
		}
	};
}

/**
 * Scales a 5 bit channel up to 8 bits. 0 maps to 0 and 31 to 255.
 */
export function widen5(channel5: number): number {
	return Math.floor(channel5 * 255 / 31);
}

/**
 * Scales an 8 bit channel down to 5 bits by dropping the low 3 bits.
 * This truncates rather than rounds, so 255 maps to 31 and 7 maps to 0.
 */
export function narrow5(channel8: number): number {
	return (channel8 >> 3) & 0x1F;
}
