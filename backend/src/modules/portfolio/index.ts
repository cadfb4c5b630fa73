/**
 * PORTFOLIO MODULE — Index
 */

export * from './contracts/position.types.js';
export * from './services/pnl.engine.js';
export { loadPositions, parsePositionsCsv } from './loaders/positions.loader.js';
export { loadCurveParameters, CurveParametersSchema } from './loaders/curve-params.loader.js';
