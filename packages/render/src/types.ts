/**
 * Renderer types
 */

import type { Color, ImageEncoder } from '@figpaint/core'

/** Render options */
export interface RenderOptions {
	/** Color for pixels no figure covers (default: opaque gray 128) */
	background?: Color
	/** Reject figures that fail checkFigure instead of rendering them */
	strict?: boolean
}

/** Options for writing a rendered figure to disk */
export interface PictureOptions extends RenderOptions {
	/** File encoder (default: PNG with default options) */
	encoder?: ImageEncoder
}
