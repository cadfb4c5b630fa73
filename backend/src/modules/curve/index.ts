/**
 * CURVE MODULE — Index
 */

export * from './contracts/curve.types.js';
export * from './services/nelson-siegel.model.js';
export * from './services/curve.drift.js';
export * from './services/seeded-random.js';
