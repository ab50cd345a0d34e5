import { describe, expect, it } from 'vitest'
import { parseArgs, parseColor, parseVector } from './args'

describe('CLI args', () => {
	it('should collect inputs and options', () => {
		const { inputs, options } = parseArgs([
			'scene.json',
			'out.png',
			'-w',
			'200',
			'--height',
			'80',
			'--move',
			'-20,20',
			'-b',
			'1,2,3',
			'--strict',
			'-v',
		])

		expect(inputs).toEqual(['scene.json', 'out.png'])
		expect(options).toEqual({
			width: 200,
			height: 80,
			move: [-20, 20],
			background: [1, 2, 3, 255],
			strict: true,
			verbose: true,
		})
	})

	it('should parse command flags', () => {
		expect(parseArgs(['--bbox', 'a.json']).options.bbox).toBe(true)
		expect(parseArgs(['--check']).options.check).toBe(true)
		expect(parseArgs(['--demo', '-o', 'out']).options).toEqual({ demo: true, out: 'out' })
		expect(parseArgs(['--dry-run', '--overwrite', '--quiet']).options).toEqual({
			dryRun: true,
			overwrite: true,
			quiet: true,
		})
	})

	it('should reject unknown options', () => {
		expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus')
	})

	it('should reject bad dimensions', () => {
		expect(() => parseArgs(['-w', '0'])).toThrow('Invalid width: "0" (expected positive integer)')
		expect(() => parseArgs(['-h', '1.5'])).toThrow('Invalid height: "1.5" (expected positive integer)')
	})

	describe('parseVector', () => {
		it('should parse signed integers', () => {
			expect(parseVector('-20,20')).toEqual([-20, 20])
			expect(parseVector(' 3 , -4 ')).toEqual([3, -4])
		})

		it('should require two integers', () => {
			expect(() => parseVector('1,2,3')).toThrow('Invalid vector (expected dx,dy): "1,2,3"')
			expect(() => parseVector('a,b')).toThrow('Invalid vector (expected dx,dy): "a,b"')
			expect(() => parseVector('5')).toThrow('Invalid vector (expected dx,dy): "5"')
		})
	})

	describe('parseColor', () => {
		it('should parse rgb as opaque', () => {
			expect(parseColor('128,128,128')).toEqual([128, 128, 128, 255])
		})

		it('should parse rgba', () => {
			expect(parseColor('1,2,3,4')).toEqual([1, 2, 3, 4])
		})

		it('should reject out of range channels', () => {
			expect(() => parseColor('300,0,0')).toThrow('Invalid red channel: 300')
		})

		it('should reject the wrong channel count', () => {
			expect(() => parseColor('1,2')).toThrow('Invalid color (expected r,g,b[,a]): "1,2"')
			expect(() => parseColor('1,2,3,4,5')).toThrow('Invalid color (expected r,g,b[,a]): "1,2,3,4,5"')
		})
	})
})
