/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Integer pixel coordinate
 */
export interface Point {
	readonly x: number
	readonly y: number
}

/** RGBA color */
export type Color = readonly [number, number, number, number]

/**
 * Color decomposed into channels, alpha first
 */
export type Argb = readonly [number, number, number, number]

/**
 * Produces the color of a single pixel
 */
export type PixelFn = (x: number, y: number) => Color

/**
 * Encodes a canvas into a file format
 */
export interface ImageEncoder {
	readonly format: string
	readonly extension: string
	encode(image: ImageData): Uint8Array
}
