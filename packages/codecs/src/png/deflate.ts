/**
 * zlib stream made of stored (uncompressed) deflate blocks
 */

const MAX_STORED_BLOCK = 65535

/**
 * Adler-32 checksum
 */
export function adler32(data: Uint8Array): number {
	let a = 1
	let b = 0
	const MOD = 65521

	for (let i = 0; i < data.length; i++) {
		a = (a + data[i]!) % MOD
		b = (b + a) % MOD
	}

	return ((b << 16) | a) >>> 0
}

/**
 * Deflate data (raw, no zlib header) as stored blocks
 */
export function deflateRaw(data: Uint8Array): Uint8Array {
	// Empty input still needs one final block
	const blockCount = Math.max(1, Math.ceil(data.length / MAX_STORED_BLOCK))
	const output = new Uint8Array(blockCount * 5 + data.length)
	let offset = 0

	for (let n = 0; n < blockCount; n++) {
		const start = n * MAX_STORED_BLOCK
		const len = Math.min(MAX_STORED_BLOCK, data.length - start)
		const nlen = len ^ 0xffff

		// BFINAL on the last block, BTYPE=00
		output[offset] = n === blockCount - 1 ? 0x01 : 0x00
		output[offset + 1] = len & 0xff
		output[offset + 2] = (len >> 8) & 0xff
		output[offset + 3] = nlen & 0xff
		output[offset + 4] = (nlen >> 8) & 0xff
		output.set(data.subarray(start, start + len), offset + 5)
		offset += 5 + len
	}

	return output
}

/**
 * Deflate data with zlib wrapper
 */
export function deflate(data: Uint8Array): Uint8Array {
	const compressed = deflateRaw(data)
	const checksum = adler32(data)

	const output = new Uint8Array(2 + compressed.length + 4)
	// CM=8, CINFO=7; (0x78 * 256 + 0x01) % 31 == 0
	output[0] = 0x78
	output[1] = 0x01
	output.set(compressed, 2)

	const end = 2 + compressed.length
	output[end] = (checksum >>> 24) & 0xff
	output[end + 1] = (checksum >> 16) & 0xff
	output[end + 2] = (checksum >> 8) & 0xff
	output[end + 3] = checksum & 0xff

	return output
}
