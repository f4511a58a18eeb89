/**
 * Display output for shapes
 */

export * from './sampleCurve.js';
export * from './edgeLines.js';
