import assert from 'node:assert/strict';
import { test } from 'node:test';
import StreamIn from '@/stream-in';
import StreamOut from '@/stream-out';
import Format15 from '@/formats/targa15';
import Format16 from '@/formats/targa16';
import Format32 from '@/formats/targa32';
import { targa24 } from '@/formats/targa24';
import { narrow5, widen5 } from '@/formats/channels';
import { layoutForSpec, selectPixelFormat } from '@/formats';
import { ArgumentError, FormatError } from '@/errors';

function written(write: (stream: StreamOut) => void): number[] {
	const stream = new StreamOut();

	write(stream);

	return [...stream.bytes()];
}

void test('pixel formats are selected from bit depth and alpha depth', () => {
	const cases = [
		{ bitsPerPixel: 16, alphaDepth: 0, kind: 'Format15', bytesPerPixel: 2, hasAlpha: false },
		{ bitsPerPixel: 16, alphaDepth: 1, kind: 'Format16', bytesPerPixel: 2, hasAlpha: true },
		{ bitsPerPixel: 24, alphaDepth: 0, kind: 'Format24', bytesPerPixel: 3, hasAlpha: false },
		{ bitsPerPixel: 32, alphaDepth: 0, kind: 'Format24', bytesPerPixel: 4, hasAlpha: false },
		{ bitsPerPixel: 32, alphaDepth: 8, kind: 'Format32', bytesPerPixel: 4, hasAlpha: true }
	];

	for (const { bitsPerPixel, alphaDepth, kind, bytesPerPixel, hasAlpha } of cases) {
		const format = selectPixelFormat(bitsPerPixel, alphaDepth);

		assert.equal(format.kind, kind);
		assert.equal(format.bytesPerPixel, bytesPerPixel);
		assert.equal(format.hasAlpha, hasAlpha);
	}
});

void test('unsupported bit depths are rejected', () => {
	assert.throws(() => selectPixelFormat(16, 3), { name: 'FormatError', message: '16 bpp with 3-bit alpha channel not supported' });
	assert.throws(() => selectPixelFormat(8, 0), FormatError);
	assert.throws(() => selectPixelFormat(24, 8), FormatError);
	assert.throws(() => selectPixelFormat(32, 1), FormatError);
});

void test('creation specs map to header layouts', () => {
	assert.deepEqual(layoutForSpec(15, true), { bitsPerPixel: 16, alphaDepth: 1 });
	assert.deepEqual(layoutForSpec(16, false), { bitsPerPixel: 16, alphaDepth: 0 });
	assert.deepEqual(layoutForSpec(24, false), { bitsPerPixel: 24, alphaDepth: 0 });
	assert.deepEqual(layoutForSpec(24, true), { bitsPerPixel: 32, alphaDepth: 8 });

	assert.throws(() => layoutForSpec(15, false), ArgumentError);
	assert.throws(() => layoutForSpec(16, true), ArgumentError);
	assert.throws(() => layoutForSpec(32, true), ArgumentError);
	assert.throws(() => layoutForSpec(8, false), ArgumentError);
});

void test('5 bit channels truncate on the way down and span 0 to 255 on the way up', () => {
	assert.equal(narrow5(255), 31);
	assert.equal(narrow5(7), 0);
	assert.equal(narrow5(8), 1);
	assert.equal(narrow5(127.9), 15);
	assert.equal(widen5(0), 0);
	assert.equal(widen5(1), 8);
	assert.equal(widen5(16), 131);
	assert.equal(widen5(31), 255);
});

void test('format15 packs and unpacks 5-5-5 colors', () => {
	assert.equal(Format15.colorFromRGB(255, 255, 255), 0x7FFF);
	assert.deepEqual(Format15.rgbFromColor(0x7FFF), [255, 255, 255]);

	assert.equal(Format15.colorFromRGB(255, 0, 0), 0x7C00);
	assert.deepEqual(Format15.rgbFromColor(0x7C00), [255, 0, 0]);

	assert.equal(Format15.colorFromRGB(7, 8, 15), 0x21);
	assert.deepEqual(Format15.rgbFromColor(0x21), [0, 8, 8]);
});

void test('format15 emulates an opaque alpha channel', () => {
	assert.deepEqual(Format15.rgbaFromColor(0x7C00), [255, 0, 0, 255]);
	assert.equal(Format15.colorFromRGBA(255, 0, 0, 0), 0x7C00);
});

void test('format15 colors survive a trip through 8 bit channels', () => {
	for (let color = 0; color <= 0x7FFF; color++) {
		assert.equal(Format15.colorFromRGB(...Format15.rgbFromColor(color)), color);
	}
});

void test('format15 ignores the top bit on disk', () => {
	assert.equal(Format15.readColor(new StreamIn(Buffer.from([0xFF, 0xFF]))), 0x7FFF);
	assert.deepEqual(written(stream => Format15.writeColor(stream, 0x7C1F)), [0x1F, 0x7C]);
});

void test('format16 stores a 1 bit alpha in the top bit', () => {
	assert.equal(Format16.colorFromRGBA(0, 0, 255, 128), 0x801F);
	assert.equal(Format16.colorFromRGBA(0, 0, 255, 127), 0x001F);
	assert.deepEqual(Format16.rgbaFromColor(0x801F), [0, 0, 255, 255]);
	assert.deepEqual(Format16.rgbaFromColor(0x001F), [0, 0, 255, 0]);
});

void test('format16 writes RGB colors fully opaque', () => {
	assert.equal(Format16.colorFromRGB(255, 255, 255), 0xFFFF);
	assert.deepEqual(Format16.rgbFromColor(0x801F), [0, 0, 255]);
	assert.equal(Format16.readColor(new StreamIn(Buffer.from([0x00, 0xFC]))), 0xFC00);
});

void test('format24 copies channels without scaling', () => {
	const format = targa24(3);

	assert.equal(format.colorFromRGB(0x12, 0x34, 0x56), 0x123456);
	assert.deepEqual(format.rgbFromColor(0x123456), [0x12, 0x34, 0x56]);
	assert.deepEqual(format.rgbaFromColor(0x123456), [0x12, 0x34, 0x56, 255]);
	assert.equal(format.colorFromRGBA(0x12, 0x34, 0x56, 0), 0x123456);
});

void test('format24 reads and writes 3 and 4 byte pixels', () => {
	const packed = targa24(3);
	const padded = targa24(4);

	assert.deepEqual(written(stream => packed.writeColor(stream, 0x123456)), [0x56, 0x34, 0x12]);
	assert.deepEqual(written(stream => padded.writeColor(stream, 0x123456)), [0x56, 0x34, 0x12, 0x00]);

	const stream = new StreamIn(Buffer.from([0x56, 0x34, 0x12, 0x99, 0x01, 0x02, 0x03, 0x00]));

	assert.equal(padded.readColor(stream), 0x123456);
	assert.equal(stream.pos, 4);
	assert.equal(padded.readColor(stream), 0x030201);
});

void test('format32 packs alpha into the top byte', () => {
	assert.equal(Format32.colorFromRGBA(0x12, 0x34, 0x56, 0xFF), 0xFF123456);
	assert.deepEqual(Format32.rgbaFromColor(0xFF123456), [0x12, 0x34, 0x56, 0xFF]);
	assert.equal(Format32.colorFromRGB(1, 2, 3), 0xFF010203);
	assert.deepEqual(Format32.rgbFromColor(0x80010203), [1, 2, 3]);
	assert.deepEqual(written(stream => Format32.writeColor(stream, 0xFF123456)), [0x56, 0x34, 0x12, 0xFF]);
});
