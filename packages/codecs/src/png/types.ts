/**
 * PNG color types
 */
export const ColorType = {
	Grayscale: 0,
	RGB: 2,
	Indexed: 3,
	GrayscaleAlpha: 4,
	RGBA: 6,
} as const

export type ColorType = (typeof ColorType)[keyof typeof ColorType]

/**
 * PNG filter types
 */
export const FilterType = {
	None: 0,
	Sub: 1,
	Up: 2,
	Average: 3,
	Paeth: 4,
} as const

export type FilterType = (typeof FilterType)[keyof typeof FilterType]

/**
 * PNG signature bytes
 */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10])

/**
 * PNG encode options
 */
export interface PngEncodeOptions {
	/** Scanline filter; 'adaptive' picks the smallest per row (default) */
	filter?: FilterType | 'adaptive'
	/** Maximum IDAT payload size in bytes (default 65536) */
	idatSize?: number
	/** tEXt chunks, keyword to Latin-1 text */
	text?: Record<string, string>
}
