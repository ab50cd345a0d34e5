/**
 * Figure types
 */

import type { Color, Point } from '@figpaint/core'

/** Filled circle, boundary inclusive */
export interface Circle {
	readonly type: 'circle'
	readonly center: Point
	readonly radius: number
	readonly color: Color
}

/** Filled axis-aligned rectangle, edges inclusive */
export interface Rectangle {
	readonly type: 'rectangle'
	readonly topLeft: Point
	readonly bottomRight: Point
	readonly color: Color
}

/** Overlay of two figures, colors averaged where both cover a point */
export interface Mix {
	readonly type: 'mix'
	readonly first: Figure
	readonly second: Figure
}

export type Figure = Circle | Rectangle | Mix

/** Axis-aligned box given by its corners */
export interface BoundingBox {
	readonly topLeft: Point
	readonly bottomRight: Point
}
