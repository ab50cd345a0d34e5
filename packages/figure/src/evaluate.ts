/**
 * Geometry evaluation over the figure tree
 */

import { fromArgb, fromColor } from '@figpaint/core'
import type { Color, Point } from '@figpaint/core'
import type { BoundingBox, Figure } from './types'

function unreachable(figure: never): never {
	throw new Error(`Unknown figure type: ${JSON.stringify(figure)}`)
}

/**
 * Average two colors channel by channel, rounding down
 */
export function blendColors(c1: Color, c2: Color): Color {
	const [a1, r1, g1, b1] = fromColor(c1)
	const [a2, r2, g2, b2] = fromColor(c2)
	return fromArgb(
		Math.floor((a1 + a2) / 2),
		Math.floor((r1 + r2) / 2),
		Math.floor((g1 + g2) / 2),
		Math.floor((b1 + b2) / 2)
	)
}

/**
 * Resolve the color of a figure at a point
 *
 * Returns undefined when no shape covers the point.
 */
export function colorAt(p: Point, figure: Figure): Color | undefined {
	switch (figure.type) {
		case 'circle': {
			const dx = p.x - figure.center.x
			const dy = p.y - figure.center.y
			const r = figure.radius
			return dx * dx + dy * dy <= r * r ? figure.color : undefined
		}

		case 'rectangle': {
			const { topLeft, bottomRight } = figure
			const inside =
				topLeft.x <= p.x && p.x <= bottomRight.x && topLeft.y <= p.y && p.y <= bottomRight.y
			return inside ? figure.color : undefined
		}

		case 'mix': {
			const c1 = colorAt(p, figure.first)
			const c2 = colorAt(p, figure.second)
			if (c1 === undefined) return c2
			if (c2 === undefined) return c1
			return blendColors(c1, c2)
		}

		default:
			return unreachable(figure)
	}
}

/**
 * Check structural validity: non-negative radii, non-inverted rectangles
 */
export function checkFigure(figure: Figure): boolean {
	switch (figure.type) {
		case 'circle':
			return figure.radius >= 0
		case 'rectangle':
			return figure.topLeft.x <= figure.bottomRight.x && figure.topLeft.y <= figure.bottomRight.y
		case 'mix':
			return checkFigure(figure.first) && checkFigure(figure.second)
		default:
			return unreachable(figure)
	}
}

/**
 * Translate a figure by (dx, dy)
 */
export function move(figure: Figure, dx: number, dy: number): Figure {
	const shift = (p: Point): Point => ({ x: p.x + dx, y: p.y + dy })

	switch (figure.type) {
		case 'circle':
			return { ...figure, center: shift(figure.center) }
		case 'rectangle':
			return { ...figure, topLeft: shift(figure.topLeft), bottomRight: shift(figure.bottomRight) }
		case 'mix':
			return { type: 'mix', first: move(figure.first, dx, dy), second: move(figure.second, dx, dy) }
		default:
			return unreachable(figure)
	}
}

/**
 * Smallest axis-aligned box enclosing the boxes of every shape
 *
 * Rectangle corners are taken as given, inverted ones included.
 */
export function boundingBox(figure: Figure): BoundingBox {
	switch (figure.type) {
		case 'circle': {
			const { center, radius: r } = figure
			return {
				topLeft: { x: center.x - r, y: center.y - r },
				bottomRight: { x: center.x + r, y: center.y + r },
			}
		}

		case 'rectangle':
			return { topLeft: figure.topLeft, bottomRight: figure.bottomRight }

		case 'mix': {
			const b1 = boundingBox(figure.first)
			const b2 = boundingBox(figure.second)
			return {
				topLeft: {
					x: Math.min(b1.topLeft.x, b2.topLeft.x),
					y: Math.min(b1.topLeft.y, b2.topLeft.y),
				},
				bottomRight: {
					x: Math.max(b1.bottomRight.x, b2.bottomRight.x),
					y: Math.max(b1.bottomRight.y, b2.bottomRight.y),
				},
			}
		}

		default:
			return unreachable(figure)
	}
}

/**
 * Depth of the mix tree (a single shape has depth 1)
 */
export function figureDepth(figure: Figure): number {
	if (figure.type !== 'mix') return 1
	return 1 + Math.max(figureDepth(figure.first), figureDepth(figure.second))
}

/**
 * Number of circles and rectangles in the tree
 */
export function countShapes(figure: Figure): number {
	if (figure.type !== 'mix') return 1
	return countShapes(figure.first) + countShapes(figure.second)
}
