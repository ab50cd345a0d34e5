/**
 * @figpaint/codecs - Image encoders
 */

export { createPngCodec, PngCodec } from './png/codec'
export { encodePng, filterScanline, crc32 } from './png/encoder'
export { adler32, deflate, deflateRaw } from './png/deflate'
export * from './png/types'
