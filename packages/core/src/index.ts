/**
 * @figpaint/core - Colors, points and canvas allocation
 */

export * from './types'
export * from './color'
export * from './canvas'
