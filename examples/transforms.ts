import { ArgumentError } from '@/index';
import type { RGB, TGAImage } from '@/index';

/**
 * Writes the color negative of `input` into `output`, one row at a time.
 * Both images must have the same dimensions.
 */
export function invertImage(input: TGAImage, output: TGAImage): void {
	for (const [row, y] of input.eachRowRGB()) {
		output.putRowRGB(y, row.map(([r, g, b]): RGB => [255 - r, 255 - g, 255 - b]));
	}
}

/**
 * Writes the per-pixel mean of several images into `output`. This pulls
 * the static background out of a sequence of animation frames.
 *
 * Only one row of each input is held in memory at a time.
 *
 * @param onRow - Called before each row is processed.
 * @throws {ArgumentError} If there are no inputs or their dimensions differ.
 */
export function meanImage(inputs: readonly TGAImage[], output: TGAImage, onRow?: (y: number, height: number) => void): void {
	const [first] = inputs;

	if (first === undefined) {
		throw new ArgumentError('At least one input image is needed');
	}

	const { width, height } = first;

	for (const image of [...inputs, output]) {
		if (image.width !== width || image.height !== height) {
			throw new ArgumentError(`Image is ${image.width}x${image.height}, expected ${width}x${height}`);
		}
	}

	for (let y = 0; y < height; y++) {
		onRow?.(y, height);

		const rows = inputs.map(image => image.getRowRGB(y));
		const mean: RGB[] = [];

		for (let x = 0; x < width; x++) {
			const sum: RGB = [0, 0, 0];

			for (const row of rows) {
				sum[0] += row[x][0];
				sum[1] += row[x][1];
				sum[2] += row[x][2];
			}

			mean.push([
				Math.floor(sum[0] / rows.length),
				Math.floor(sum[1] / rows.length),
				Math.floor(sum[2] / rows.length)
			]);
		}

		output.putRowRGB(y, mean);
	}
}
