/**
 * Figure rasterization
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { PngCodec } from '@figpaint/codecs'
import { createCanvas, fromRgb } from '@figpaint/core'
import type { Color, ImageData } from '@figpaint/core'
import { checkFigure, colorAt } from '@figpaint/figure'
import type { Figure } from '@figpaint/figure'
import type { PictureOptions, RenderOptions } from './types'

/**
 * Background for uncovered pixels
 */
export const DEFAULT_BACKGROUND: Color = fromRgb(128, 128, 128)

/**
 * Render a figure onto a width x height canvas
 */
export function renderFigure(
	figure: Figure,
	width: number,
	height: number,
	options: RenderOptions = {}
): ImageData {
	const background = options.background ?? DEFAULT_BACKGROUND

	if (options.strict && !checkFigure(figure)) {
		throw new Error('Invalid figure: negative radius or inverted rectangle')
	}

	return createCanvas(width, height, (x, y) => colorAt({ x, y }, figure) ?? background)
}

/**
 * Render a figure and write it through an encoder, PNG by default
 *
 * Parent directories are created as needed.
 */
export function makePicture(
	path: string,
	figure: Figure,
	width: number,
	height: number,
	options: PictureOptions = {}
): ImageData {
	const image = renderFigure(figure, width, height, options)
	const encoder = options.encoder ?? PngCodec

	mkdirSync(dirname(path), { recursive: true })
	writeFileSync(path, encoder.encode(image))

	return image
}
