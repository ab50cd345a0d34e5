#!/usr/bin/env tsx
/**
 * figpaint CLI - Render figures to PNG
 */

import { run } from './run'

try {
	process.exitCode = run(process.argv.slice(2))
} catch (err) {
	console.error('Fatal error:', err)
	process.exitCode = 1
}
