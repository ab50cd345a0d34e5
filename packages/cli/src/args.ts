/**
 * Command line argument parsing
 */

import { fromArgb, fromRgb } from '@figpaint/core'
import type { Color } from '@figpaint/core'

export interface CliOptions {
	// Output
	out?: string
	overwrite?: boolean

	// Canvas
	width?: number
	height?: number
	background?: Color
	move?: readonly [number, number]
	strict?: boolean

	// Flags
	verbose?: boolean
	quiet?: boolean
	dryRun?: boolean

	// Commands
	bbox?: boolean
	check?: boolean
	demo?: boolean
	help?: boolean
	version?: boolean
}

function parseIntegers(text: string, what: string): number[] {
	const parts = text.split(',').map((part) => part.trim())
	if (parts.some((part) => !/^-?\d+$/.test(part))) {
		throw new Error(`Invalid ${what}: "${text}"`)
	}
	return parts.map((part) => parseInt(part, 10))
}

/**
 * Parse "dx,dy"
 */
export function parseVector(text: string): readonly [number, number] {
	const values = parseIntegers(text, 'vector (expected dx,dy)')
	const [dx, dy] = values
	if (values.length !== 2 || dx === undefined || dy === undefined) {
		throw new Error(`Invalid vector (expected dx,dy): "${text}"`)
	}
	return [dx, dy]
}

/**
 * Parse "r,g,b" or "r,g,b,a"
 */
export function parseColor(text: string): Color {
	const values = parseIntegers(text, 'color (expected r,g,b[,a])')
	const [r, g, b, a] = values
	if (r === undefined || g === undefined || b === undefined || values.length > 4) {
		throw new Error(`Invalid color (expected r,g,b[,a]): "${text}"`)
	}
	return a === undefined ? fromRgb(r, g, b) : fromArgb(a, r, g, b)
}

function parseDimension(text: string, name: string): number {
	const value = Number(text)
	if (!Number.isInteger(value) || value <= 0) {
		throw new Error(`Invalid ${name}: "${text}" (expected positive integer)`)
	}
	return value
}

export function parseArgs(args: readonly string[]): { inputs: string[]; options: CliOptions } {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i]!
		const next = args[i + 1]

		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--demo') {
			options.demo = true
		} else if (arg === '--bbox') {
			options.bbox = true
		} else if (arg === '--check') {
			options.check = true
		} else if (arg === '--strict') {
			options.strict = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--dry-run') {
			options.dryRun = true
		} else if (arg === '--overwrite') {
			options.overwrite = true
		} else if ((arg === '--out' || arg === '-o') && next !== undefined) {
			options.out = next
			i++
		} else if ((arg === '--width' || arg === '-w') && next !== undefined) {
			options.width = parseDimension(next, 'width')
			i++
		} else if ((arg === '--height' || arg === '-h') && next !== undefined) {
			options.height = parseDimension(next, 'height')
			i++
		} else if ((arg === '--background' || arg === '-b') && next !== undefined) {
			options.background = parseColor(next)
			i++
		} else if ((arg === '--move' || arg === '-m') && next !== undefined) {
			options.move = parseVector(next)
			i++
		} else if (!arg.startsWith('-') || arg === '-') {
			inputs.push(arg)
		} else {
			throw new Error(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}
