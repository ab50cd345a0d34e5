/**
 * Figure constructors
 *
 * Nothing is validated here; use checkFigure before rendering
 * if malformed shapes must be rejected.
 */

import type { Color, Point } from '@figpaint/core'
import type { Circle, Figure, Mix, Rectangle } from './types'

export function circle(center: Point, radius: number, color: Color): Circle {
	return { type: 'circle', center, radius, color }
}

export function rectangle(topLeft: Point, bottomRight: Point, color: Color): Rectangle {
	return { type: 'rectangle', topLeft, bottomRight, color }
}

export function mix(first: Figure, second: Figure): Mix {
	return { type: 'mix', first, second }
}

/**
 * Shorthand point constructor
 */
export function point(x: number, y: number): Point {
	return { x, y }
}
