import type { ImageEncoder } from '@figpaint/core'
import { encodePng } from './encoder'
import type { PngEncodeOptions } from './types'

/**
 * PNG encoder bound to a set of options
 */
export function createPngCodec(options: PngEncodeOptions = {}): ImageEncoder {
	return {
		format: 'png',
		extension: 'png',

		encode(image) {
			return encodePng(image, options)
		},
	}
}

/**
 * PNG encoder with default options
 */
export const PngCodec: ImageEncoder = createPngCodec()
