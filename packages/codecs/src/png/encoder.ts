import type { ImageData } from '@figpaint/core'
import { deflate } from './deflate'
import { ColorType, FilterType, PNG_SIGNATURE, type PngEncodeOptions } from './types'

const DEFAULT_IDAT_SIZE = 65536

/**
 * Write 32-bit big-endian unsigned integer
 */
function writeU32BE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = (value >>> 24) & 0xff
	data[offset + 1] = (value >> 16) & 0xff
	data[offset + 2] = (value >> 8) & 0xff
	data[offset + 3] = value & 0xff
}

const crcTable: number[] = []
for (let n = 0; n < 256; n++) {
	let c = n
	for (let k = 0; k < 8; k++) {
		c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
	}
	crcTable[n] = c
}

/**
 * CRC32 over a byte range
 */
export function crc32(data: Uint8Array, start = 0, length = data.length - start): number {
	let crc = 0xffffffff
	for (let i = start; i < start + length; i++) {
		crc = crcTable[(crc ^ data[i]!) & 0xff]! ^ (crc >>> 8)
	}
	return (crc ^ 0xffffffff) >>> 0
}

/**
 * Latin-1 bytes of an ASCII chunk type or text field
 */
function latin1(text: string): Uint8Array {
	const bytes = new Uint8Array(text.length)
	for (let i = 0; i < text.length; i++) {
		const code = text.charCodeAt(i)
		if (code > 0xff) {
			throw new Error(`PNG text must be Latin-1, got U+${code.toString(16).padStart(4, '0')}`)
		}
		bytes[i] = code
	}
	return bytes
}

/**
 * Create a PNG chunk: length, type, data, CRC over type + data
 */
function createChunk(type: string, data: Uint8Array): Uint8Array {
	const chunk = new Uint8Array(12 + data.length)
	writeU32BE(chunk, 0, data.length)
	chunk.set(latin1(type), 4)
	chunk.set(data, 8)
	writeU32BE(chunk, 8 + data.length, crc32(chunk, 4, data.length + 4))
	return chunk
}

function createIHDR(width: number, height: number): Uint8Array {
	const data = new Uint8Array(13)
	writeU32BE(data, 0, width)
	writeU32BE(data, 4, height)
	data[8] = 8 // Bit depth
	data[9] = ColorType.RGBA
	// Compression, filter and interlace methods stay 0
	return createChunk('IHDR', data)
}

function createText(keyword: string, text: string): Uint8Array {
	if (keyword.length < 1 || keyword.length > 79) {
		throw new Error(`PNG text keyword must be 1-79 characters: "${keyword}"`)
	}
	const key = latin1(keyword)
	const value = latin1(text)
	const data = new Uint8Array(key.length + 1 + value.length)
	data.set(key, 0)
	data.set(value, key.length + 1)
	return createChunk('tEXt', data)
}

/**
 * Paeth predictor
 */
function paethPredictor(a: number, b: number, c: number): number {
	const p = a + b - c
	const pa = Math.abs(p - a)
	const pb = Math.abs(p - b)
	const pc = Math.abs(p - c)
	if (pa <= pb && pa <= pc) return a
	if (pb <= pc) return b
	return c
}

/**
 * Filter a scanline, prefixing the filter type byte
 */
export function filterScanline(
	current: Uint8Array,
	previous: Uint8Array | null,
	bpp: number,
	filterType: FilterType
): Uint8Array {
	const len = current.length
	const filtered = new Uint8Array(len + 1)
	filtered[0] = filterType

	for (let i = 0; i < len; i++) {
		const a = i >= bpp ? current[i - bpp]! : 0
		const b = previous ? previous[i]! : 0
		const c = i >= bpp && previous ? previous[i - bpp]! : 0

		let predicted = 0
		switch (filterType) {
			case FilterType.Sub:
				predicted = a
				break
			case FilterType.Up:
				predicted = b
				break
			case FilterType.Average:
				predicted = Math.floor((a + b) / 2)
				break
			case FilterType.Paeth:
				predicted = paethPredictor(a, b, c)
				break
		}

		filtered[i + 1] = (current[i]! - predicted) & 0xff
	}

	return filtered
}

/**
 * Sum of filtered bytes read as signed values
 */
function sumAbsolute(data: Uint8Array): number {
	let sum = 0
	for (let i = 1; i < data.length; i++) {
		const v = data[i]!
		sum += v < 128 ? v : 256 - v
	}
	return sum
}

const FILTERS: readonly FilterType[] = [
	FilterType.None,
	FilterType.Sub,
	FilterType.Up,
	FilterType.Average,
	FilterType.Paeth,
]

function selectFilter(current: Uint8Array, previous: Uint8Array | null, bpp: number): Uint8Array {
	let best = filterScanline(current, previous, bpp, FilterType.None)
	let bestSum = sumAbsolute(best)

	for (const filterType of FILTERS.slice(1)) {
		const filtered = filterScanline(current, previous, bpp, filterType)
		const sum = sumAbsolute(filtered)
		if (sum < bestSum) {
			bestSum = sum
			best = filtered
		}
	}

	return best
}

function createIDAT(image: ImageData, filter: FilterType | 'adaptive', idatSize: number): Uint8Array[] {
	const { width, height, data } = image
	const bpp = 4 // RGBA
	const scanlineBytes = width * bpp

	const filteredData = new Uint8Array((scanlineBytes + 1) * height)
	let prevScanline: Uint8Array | null = null

	for (let y = 0; y < height; y++) {
		const scanline = data.subarray(y * scanlineBytes, (y + 1) * scanlineBytes)
		const filtered =
			filter === 'adaptive'
				? selectFilter(scanline, prevScanline, bpp)
				: filterScanline(scanline, prevScanline, bpp, filter)
		filteredData.set(filtered, y * (scanlineBytes + 1))
		prevScanline = scanline
	}

	const compressed = deflate(filteredData)
	const chunks: Uint8Array[] = []
	for (let offset = 0; offset < compressed.length; offset += idatSize) {
		chunks.push(createChunk('IDAT', compressed.subarray(offset, offset + idatSize)))
	}
	return chunks
}

/**
 * Encode ImageData to PNG (8-bit RGBA)
 */
export function encodePng(image: ImageData, options: PngEncodeOptions = {}): Uint8Array {
	const { width, height, data } = image
	const filter = options.filter ?? 'adaptive'
	const idatSize = options.idatSize ?? DEFAULT_IDAT_SIZE

	if (width <= 0 || height <= 0) {
		throw new Error(`Cannot encode empty image (${width}x${height})`)
	}
	if (data.length !== width * height * 4) {
		throw new Error(`Image data length ${data.length} does not match ${width}x${height} RGBA`)
	}
	if (!Number.isInteger(idatSize) || idatSize <= 0) {
		throw new Error(`IDAT size must be a positive integer, got ${idatSize}`)
	}

	const chunks: Uint8Array[] = [createIHDR(width, height)]
	for (const [keyword, text] of Object.entries(options.text ?? {})) {
		chunks.push(createText(keyword, text))
	}
	chunks.push(...createIDAT(image, filter, idatSize))
	chunks.push(createChunk('IEND', new Uint8Array(0)))

	const totalSize = PNG_SIGNATURE.length + chunks.reduce((sum, c) => sum + c.length, 0)
	const output = new Uint8Array(totalSize)
	output.set(PNG_SIGNATURE, 0)

	let offset = PNG_SIGNATURE.length
	for (const chunk of chunks) {
		output.set(chunk, offset)
		offset += chunk.length
	}

	return output
}
