import { existsSync } from 'node:fs'
import { basename, dirname, extname, join, resolve } from 'node:path'
import { createPngCodec } from '@figpaint/codecs'
import { blue, red } from '@figpaint/core'
import {
	boundingBox,
	checkFigure,
	circle,
	countShapes,
	figureDepth,
	mix,
	move,
	point,
	rectangle,
} from '@figpaint/figure'
import type { BoundingBox, Figure } from '@figpaint/figure'
import { makePicture } from '@figpaint/render'
import { parseArgs, type CliOptions } from './args'
import { loadScene } from './scene'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

const HELP = `
figpaint - Render circle and rectangle figures to PNG

USAGE:
  figpaint <scene.json> [output.png]     Render a scene
  figpaint <scene.json>... -o <dir>      Render several scenes
  figpaint --bbox <scene.json>...        Print bounding boxes
  figpaint --check <scene.json>...       Validate figures
  figpaint --demo [-o <dir>]             Write figTest.png and moveTest.png
                                         (-w, -h, -b, -m and --strict apply)

OPTIONS:
  -o, --out <dir>          Output directory
  -w, --width <px>         Canvas width (overrides scene)
  -h, --height <px>        Canvas height (overrides scene)
  -b, --background <rgba>  Background color, r,g,b[,a] (default 128,128,128)
  -m, --move <dx,dy>       Translate the figure first
  --strict                 Refuse to render invalid figures
  --overwrite              Overwrite existing files
  --dry-run                Show what would be done without doing it
  -v, --verbose            Verbose output
  --quiet                  Suppress output
  --help                   Show this help
  --version                Show version

EXAMPLES:
  figpaint scenes/figtest.json figTest.png
  figpaint scenes/figtest.json moved.png --move -20,20
  figpaint --bbox scenes/figtest.json
`

/**
 * Overlapping circle and rectangle
 */
export const DEMO_FIGURE: Figure = mix(
	circle(point(50, 50), 45, red),
	rectangle(point(40, 40), point(90, 110), blue)
)

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export function formatBox({ topLeft, bottomRight }: BoundingBox): string {
	return `(${topLeft.x},${topLeft.y}) (${bottomRight.x},${bottomRight.y})`
}

function applyMove(figure: Figure, options: CliOptions): Figure {
	return options.move ? move(figure, options.move[0], options.move[1]) : figure
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function showBoxes(inputs: string[], options: CliOptions): number {
	let failed = 0
	for (const input of inputs) {
		try {
			const scene = loadScene(input)
			console.log(`${basename(input)}: ${formatBox(boundingBox(applyMove(scene.figure, options)))}`)
		} catch (err) {
			failed++
			console.error(`Failed: ${errorMessage(err)}`)
		}
	}
	return failed > 0 ? 1 : 0
}

function checkScenes(inputs: string[]): number {
	let invalid = 0
	for (const input of inputs) {
		try {
			const valid = checkFigure(loadScene(input).figure)
			if (!valid) invalid++
			console.log(`${basename(input)}: ${valid ? 'valid' : 'invalid'}`)
		} catch (err) {
			invalid++
			console.error(`Failed: ${errorMessage(err)}`)
		}
	}
	return invalid > 0 ? 1 : 0
}

function renderDemo(options: CliOptions): number {
	const outDir = resolve(options.out ?? '.')
	const figure = applyMove(DEMO_FIGURE, options)
	const width = options.width ?? 100
	const height = options.height ?? 150
	const pictures: [string, Figure][] = [
		['figTest.png', figure],
		['moveTest.png', move(figure, -20, 20)],
	]

	let failed = 0
	for (const [name, picture] of pictures) {
		const output = join(outDir, name)
		if (options.dryRun) {
			console.log(`  → ${output}`)
			continue
		}
		try {
			makePicture(output, picture, width, height, {
				background: options.background,
				strict: options.strict,
			})
			if (!options.quiet) console.log(`Wrote ${output}`)
		} catch (err) {
			failed++
			console.error(`  Failed: ${errorMessage(err)}`)
		}
	}

	console.log(`Bounding box: ${formatBox(boundingBox(figure))}`)
	return failed > 0 ? 1 : 0
}

interface RenderJob {
	input: string
	output: string
}

function planJobs(inputs: string[], options: CliOptions): RenderJob[] {
	const [first, second] = inputs
	const planned: RenderJob[] =
		first !== undefined && second !== undefined && inputs.length === 2 && extname(second) === '.png'
			? [{ input: resolve(first), output: resolve(second) }]
			: inputs.map((input) => {
					const outDir = options.out ? resolve(options.out) : dirname(resolve(input))
					return { input: resolve(input), output: join(outDir, `${basename(input, extname(input))}.png`) }
				})

	return planned.filter((job) => {
		if (existsSync(job.output) && !options.overwrite) {
			if (!options.quiet) console.log(`Skip: ${job.output} (exists, use --overwrite)`)
			return false
		}
		return true
	})
}

function renderScene(job: RenderJob, options: CliOptions): void {
	const started = performance.now()
	const scene = loadScene(job.input)
	const figure = applyMove(scene.figure, options)
	const width = options.width ?? scene.width
	const height = options.height ?? scene.height

	makePicture(job.output, figure, width, height, {
		background: options.background ?? scene.background,
		strict: options.strict,
		encoder: createPngCodec({
			text: { Software: 'figpaint', Title: basename(job.input, extname(job.input)) },
		}),
	})

	if (options.verbose && !options.quiet) {
		console.log(`       Canvas: ${width} x ${height}`)
		console.log(`       Shapes: ${countShapes(figure)} (depth ${figureDepth(figure)})`)
		console.log(`       Bounds: ${formatBox(boundingBox(figure))}`)
		console.log(`       Time: ${(performance.now() - started).toFixed(1)} ms`)
	}
}

function renderScenes(inputs: string[], options: CliOptions): number {
	const jobs = planJobs(inputs, options)

	if (jobs.length === 0) {
		if (!options.quiet) console.log('No scenes to render')
		return 0
	}

	if (options.dryRun) {
		console.log('\nDry run - would render:\n')
		for (const job of jobs) {
			console.log(`  ${job.input}`)
			console.log(`  → ${job.output}\n`)
		}
		return 0
	}

	let success = 0
	let failed = 0

	for (const job of jobs) {
		if (!options.quiet) {
			console.log(`${basename(job.input)} → ${basename(job.output)}`)
		}

		try {
			renderScene(job, options)
			success++
		} catch (err) {
			failed++
			console.error(`  Failed: ${errorMessage(err)}`)
		}
	}

	if (!options.quiet && jobs.length > 1) {
		console.log(`\nDone: ${success} rendered, ${failed} failed`)
	}

	return failed > 0 ? 1 : 0
}

// ─────────────────────────────────────────────────────────────────────────────
// Entry
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run the CLI and return the exit code
 */
export function run(argv: readonly string[]): number {
	let parsed: ReturnType<typeof parseArgs>
	try {
		parsed = parseArgs(argv)
	} catch (err) {
		console.error(errorMessage(err))
		return 1
	}
	const { inputs, options } = parsed

	if (options.version) {
		console.log(`figpaint v${VERSION}`)
		return 0
	}

	if (options.demo) {
		return renderDemo(options)
	}

	if ((options.bbox || options.check) && inputs.length === 0) {
		console.error(`Error: ${options.bbox ? '--bbox' : '--check'} requires a scene file`)
		return 1
	}

	if (options.help || inputs.length === 0) {
		console.log(HELP)
		return 0
	}

	if (options.bbox) return showBoxes(inputs, options)
	if (options.check) return checkScenes(inputs)

	return renderScenes(inputs, options)
}
