/**
 * Canvas allocation
 */

import type { Color, ImageData, PixelFn } from './types'

function assertDimension(name: string, value: number): void {
	if (!Number.isInteger(value) || value <= 0) {
		throw new Error(`Canvas ${name} must be a positive integer, got ${value}`)
	}
}

/**
 * Create a canvas by evaluating pixelFn for every coordinate
 */
export function createCanvas(width: number, height: number, pixelFn: PixelFn): ImageData {
	assertDimension('width', width)
	assertDimension('height', height)

	const data = new Uint8Array(width * height * 4)

	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const idx = (y * width + x) * 4
			const [r, g, b, a] = pixelFn(x, y)
			data[idx] = r
			data[idx + 1] = g
			data[idx + 2] = b
			data[idx + 3] = a
		}
	}

	return { width, height, data }
}

/**
 * Get a pixel color
 */
export function getPixel(image: ImageData, x: number, y: number): Color {
	if (x < 0 || x >= image.width || y < 0 || y >= image.height) {
		return [0, 0, 0, 0]
	}

	const idx = (y * image.width + x) * 4
	return [image.data[idx]!, image.data[idx + 1]!, image.data[idx + 2]!, image.data[idx + 3]!]
}
