import assert from 'node:assert/strict';
import { test } from 'node:test';
import MemoryStream from '@/memory-stream';
import { UseAfterCloseError } from '@/errors';

void test('memory stream zero-fills gaps left by seeking past the end', () => {
	const stream = new MemoryStream();

	stream.write(Buffer.from('abc'));
	stream.seek(5);
	stream.write(Buffer.from([0x01]));

	assert.deepEqual([...stream.bytes()], [0x61, 0x62, 0x63, 0x00, 0x00, 0x01]);
	assert.equal(stream.pos, 6);
});

void test('memory stream returns short reads at the end of the data', () => {
	const stream = new MemoryStream(Buffer.from([1, 2, 3, 4, 5]));

	stream.seek(3);
	assert.deepEqual([...stream.read(10)], [4, 5]);
	assert.equal(stream.pos, 5);

	stream.seek(8);
	assert.equal(stream.read(2).length, 0);
});

void test('memory stream overwrites in place', () => {
	const stream = new MemoryStream(Buffer.from([1, 2, 3, 4]));

	stream.seek(1);
	stream.write(Buffer.from([9, 9]));

	assert.deepEqual([...stream.bytes()], [1, 9, 9, 4]);
});

void test('memory stream copies its initial contents', () => {
	const initial = Buffer.from([1, 2, 3]);
	const stream = new MemoryStream(initial);

	stream.write(Buffer.from([7]));

	assert.deepEqual([...initial], [1, 2, 3]);
	assert.deepEqual([...stream.bytes()], [7, 2, 3]);
});

void test('memory stream keeps its contents readable after close', () => {
	const stream = new MemoryStream();

	stream.write(Buffer.from([1, 2]));
	stream.close();

	assert.deepEqual([...stream.bytes()], [1, 2]);
	assert.throws(() => stream.read(1), UseAfterCloseError);
	assert.throws(() => stream.write(Buffer.from([3])), UseAfterCloseError);
	assert.throws(() => stream.seek(0), UseAfterCloseError);
	assert.throws(() => stream.close(), UseAfterCloseError);
});
