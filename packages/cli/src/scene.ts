/**
 * Scene files: a figure plus canvas size, as JSON
 */

import { readFileSync } from 'node:fs'
import { fromArgb, fromRgb, namedColors } from '@figpaint/core'
import type { Color, ColorName } from '@figpaint/core'
import type { Figure } from '@figpaint/figure'
import { z } from 'zod'

type ColorInput = string | [number, number, number] | [number, number, number, number]

interface PointInput {
	x: number
	y: number
}

type FigureInput =
	| { type: 'circle'; center: PointInput; radius: number; color: ColorInput }
	| { type: 'rectangle'; topLeft: PointInput; bottomRight: PointInput; color: ColorInput }
	| { type: 'mix'; first: FigureInput; second: FigureInput }

function isColorName(name: string): name is ColorName {
	return Object.hasOwn(namedColors, name)
}

const channel = z.number().int().min(0).max(255)

const colorSchema = z.union([
	z.string().transform((name, ctx): Color => {
		const key = name.toLowerCase()
		if (!isColorName(key)) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown color "${name}"` })
			return z.NEVER
		}
		return namedColors[key]
	}),
	z.tuple([channel, channel, channel]).transform(([r, g, b]): Color => fromRgb(r, g, b)),
	z.tuple([channel, channel, channel, channel]).transform(([r, g, b, a]): Color => fromArgb(a, r, g, b)),
])

const pointSchema = z.object({ x: z.number().int(), y: z.number().int() }).strict()

export const figureSchema: z.ZodType<Figure, z.ZodTypeDef, FigureInput> = z.discriminatedUnion('type', [
	z
		.object({
			type: z.literal('circle'),
			center: pointSchema,
			// negative radii are accepted; checkFigure reports them
			radius: z.number().int(),
			color: colorSchema,
		})
		.strict(),
	z
		.object({
			type: z.literal('rectangle'),
			topLeft: pointSchema,
			bottomRight: pointSchema,
			color: colorSchema,
		})
		.strict(),
	z
		.object({
			type: z.literal('mix'),
			first: z.lazy(() => figureSchema),
			second: z.lazy(() => figureSchema),
		})
		.strict(),
])

export const sceneSchema = z
	.object({
		width: z.number().int().positive(),
		height: z.number().int().positive(),
		background: colorSchema.optional(),
		figure: figureSchema,
	})
	.strict()

export type Scene = z.infer<typeof sceneSchema>

/**
 * Validate parsed JSON as a scene
 */
export function parseScene(json: unknown, source = 'scene'): Scene {
	const result = sceneSchema.safeParse(json)
	if (!result.success) {
		const issues = result.error.issues.map((issue) => {
			const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
			return `  ${path}: ${issue.message}`
		})
		throw new Error(`Invalid scene ${source}:\n${issues.join('\n')}`)
	}
	return result.data
}

/**
 * Read and validate a scene file
 */
export function loadScene(path: string): Scene {
	const text = readFileSync(path, 'utf8')

	let json: unknown
	try {
		json = JSON.parse(text)
	} catch (err) {
		throw new Error(`Invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`)
	}

	return parseScene(json, path)
}
