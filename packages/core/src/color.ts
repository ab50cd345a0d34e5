/**
 * Color composition and named colors
 */

import type { Argb, Color } from './types'

function assertChannel(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 0 || value > 255) {
		throw new Error(`Invalid ${name} channel: ${value} (expected integer 0-255)`)
	}
}

/**
 * Build a color from alpha, red, green and blue channels
 */
export function fromArgb(a: number, r: number, g: number, b: number): Color {
	assertChannel('alpha', a)
	assertChannel('red', r)
	assertChannel('green', g)
	assertChannel('blue', b)
	return [r, g, b, a]
}

/**
 * Build a fully opaque color
 */
export function fromRgb(r: number, g: number, b: number): Color {
	return fromArgb(255, r, g, b)
}

/**
 * Decompose a color into [alpha, red, green, blue]
 */
export function fromColor(color: Color): Argb {
	const [r, g, b, a] = color
	return [a, r, g, b]
}

export const red: Color = [255, 0, 0, 255]
export const green: Color = [0, 128, 0, 255]
export const blue: Color = [0, 0, 255, 255]
export const black: Color = [0, 0, 0, 255]
export const white: Color = [255, 255, 255, 255]
export const gray: Color = [128, 128, 128, 255]
export const yellow: Color = [255, 255, 0, 255]
export const cyan: Color = [0, 255, 255, 255]
export const magenta: Color = [255, 0, 255, 255]
export const transparent: Color = [0, 0, 0, 0]

/**
 * Named colors, keyed by lowercase name
 */
export const namedColors = {
	red,
	green,
	blue,
	black,
	white,
	gray,
	yellow,
	cyan,
	magenta,
	transparent,
} as const satisfies Record<string, Color>

export type ColorName = keyof typeof namedColors
