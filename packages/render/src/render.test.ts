import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createPngCodec, encodePng, PNG_SIGNATURE } from '@figpaint/codecs'
import { blue, getPixel, red, white } from '@figpaint/core'
import { circle, mix, move, point, rectangle } from '@figpaint/figure'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DEFAULT_BACKGROUND, makePicture, renderFigure } from './index'

const figTest = mix(circle(point(50, 50), 45, red), rectangle(point(40, 40), point(90, 110), blue))

describe('Render', () => {
	describe('renderFigure', () => {
		it('should size the canvas', () => {
			const img = renderFigure(figTest, 100, 150)
			expect(img.width).toBe(100)
			expect(img.height).toBe(150)
			expect(img.data.length).toBe(100 * 150 * 4)
		})

		it('should resolve every pixel through colorAt', () => {
			const img = renderFigure(figTest, 100, 150)

			expect(getPixel(img, 50, 50)).toEqual([127, 0, 127, 255])
			expect(getPixel(img, 95, 50)).toEqual([...red])
			expect(getPixel(img, 90, 110)).toEqual([...blue])
		})

		it('should fill uncovered pixels with gray', () => {
			const img = renderFigure(figTest, 100, 150)

			expect(DEFAULT_BACKGROUND).toEqual([128, 128, 128, 255])
			expect(getPixel(img, 10, 10)).toEqual([128, 128, 128, 255])
			expect(getPixel(img, 99, 149)).toEqual([128, 128, 128, 255])
		})

		it('should use a configured background', () => {
			const img = renderFigure(figTest, 100, 150, { background: white })
			expect(getPixel(img, 10, 10)).toEqual([...white])
		})

		it('should render shapes outside the canvas partially', () => {
			const img = renderFigure(move(figTest, -20, 20), 100, 150)

			// circle now centered at (30, 70), rectangle spans (20, 60)-(70, 130)
			expect(getPixel(img, 0, 70)).toEqual([...red])
			expect(getPixel(img, 30, 70)).toEqual([127, 0, 127, 255])
			expect(getPixel(img, 70, 130)).toEqual([...blue])
			expect(getPixel(img, 50, 50)).toEqual([...red])
		})

		it('should render invalid figures unless strict', () => {
			const inverted = rectangle(point(5, 5), point(1, 1), red)
			const img = renderFigure(inverted, 8, 8)

			for (let i = 0; i < img.data.length; i += 4) {
				expect([...img.data.subarray(i, i + 4)]).toEqual([128, 128, 128, 255])
			}
			expect(() => renderFigure(inverted, 8, 8, { strict: true })).toThrow(
				'Invalid figure: negative radius or inverted rectangle'
			)
		})

		it('should accept valid figures when strict', () => {
			const img = renderFigure(figTest, 100, 150, { strict: true })
			expect(getPixel(img, 50, 50)).toEqual([127, 0, 127, 255])
		})
	})

	describe('makePicture', () => {
		let dir: string

		beforeEach(() => {
			dir = mkdtempSync(join(tmpdir(), 'figpaint-render-'))
		})

		afterEach(() => {
			rmSync(dir, { recursive: true, force: true })
		})

		it('should write a PNG file', () => {
			const path = join(dir, 'figTest.png')
			const image = makePicture(path, figTest, 100, 150)
			const written = new Uint8Array(readFileSync(path))

			expect([...written.subarray(0, 8)]).toEqual([...PNG_SIGNATURE])
			expect(written).toEqual(encodePng(image))
		})

		it('should write through a configured encoder', () => {
			const path = join(dir, 'titled.png')
			const encoder = createPngCodec({ text: { Title: 'figTest' } })
			const image = makePicture(path, figTest, 10, 10, { encoder })
			const written = new Uint8Array(readFileSync(path))

			expect(written).toEqual(encodePng(image, { text: { Title: 'figTest' } }))
		})

		it('should accept any image encoder', () => {
			const path = join(dir, 'raw.bin')
			const encoder = {
				format: 'raw',
				extension: 'bin',
				encode: (image: { data: Uint8Array }) => image.data,
			}
			const image = makePicture(path, figTest, 3, 2, { encoder })

			expect(new Uint8Array(readFileSync(path))).toEqual(image.data)
		})

		it('should create missing directories', () => {
			const path = join(dir, 'nested', 'deeper', 'out.png')
			makePicture(path, figTest, 4, 4)
			expect(readFileSync(path).length).toBeGreaterThan(8)
		})

		it('should fail on an unwritable path', () => {
			const blocker = join(dir, 'blocker')
			writeFileSync(blocker, 'not a directory')
			expect(() => makePicture(join(blocker, 'out.png'), figTest, 4, 4)).toThrow()
		})
	})
})
