export { openTGA, createTGA, VERSION } from '@/tga';
export type { CreateSpec, OpenOptions } from '@/tga';
export { default as TGAImage } from '@/tga-image';
export type { ImageSpec } from '@/tga-image';
export { default as TGAHeader } from '@/tga-header';
export type { Origin, ResolvedSpec, HeaderFields } from '@/tga-header';
export { selectPixelFormat, layoutForSpec } from '@/formats';
export type { PixelFormat, PixelFormatKind, PixelLayoutSpec, RGB, RGBA } from '@/formats';
export { default as FileStream } from '@/file-stream';
export { default as MemoryStream } from '@/memory-stream';
export type { SeekableStream } from '@/seekable-stream';
export { ArgumentError, FormatError, RowRangeError, StreamBusyError, UseAfterCloseError } from '@/errors';
export { getLogger } from '@/logger';
export type { ILogger } from '@/logger';
