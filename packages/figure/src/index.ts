/**
 * @figpaint/figure - Figure model and geometry evaluation
 */

export * from './types'
export * from './figure'
export * from './evaluate'
