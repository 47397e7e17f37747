import assert from 'node:assert/strict';
import { test } from 'node:test';
import MemoryStream from '@/memory-stream';
import { createTGA } from '@/tga';
import { ArgumentError } from '@/errors';
import { invertImage, meanImage } from '../examples/transforms';
import type { RGB } from '@/formats';

function imageOf(rows: RGB[][]) {
	const image = createTGA(new MemoryStream(), { width: rows[0].length, height: rows.length, colorDepth: 24 });

	rows.forEach((row, y) => image.putRowRGB(y, row));

	return image;
}

void test('invert image writes the color negative', () => {
	const input = imageOf([[[0, 10, 255], [100, 200, 50]]]);
	const output = createTGA(new MemoryStream(), input.spec());

	invertImage(input, output);

	assert.deepEqual(output.getRowRGB(0), [[255, 245, 0], [155, 55, 205]]);
});

void test('mean image averages every pixel and rounds down', () => {
	const inputs = [
		imageOf([[[10, 20, 30]], [[0, 0, 0]]]),
		imageOf([[[11, 40, 0]], [[255, 255, 255]]])
	];
	const output = createTGA(new MemoryStream(), { width: 1, height: 2, colorDepth: 24 });
	const progress: number[] = [];

	meanImage(inputs, output, y => progress.push(y));

	assert.deepEqual(output.getRowRGB(0), [[10, 30, 15]]);
	assert.deepEqual(output.getRowRGB(1), [[127, 127, 127]]);
	assert.deepEqual(progress, [0, 1]);
});

void test('mean image needs inputs of one size', () => {
	const output = createTGA(new MemoryStream(), { width: 1, height: 1, colorDepth: 24 });

	assert.throws(() => meanImage([], output), ArgumentError);
	assert.throws(() => meanImage([imageOf([[[1, 2, 3], [4, 5, 6]]])], output), ArgumentError);
});
