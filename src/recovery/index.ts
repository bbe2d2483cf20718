/**
 * Recovery module index
 * Scan, classify and copy pipeline for lost Live sets and packs
 */

export * from './classifier.js';
export * from './enumerator.js';
export * from './scheduler.js';
export * from './aggregator.js';
export * from './output-planner.js';
export * from './copier.js';
export * from './pipeline.js';
export * from './recovery-logger.js';
export * from './file-system.js';
export * from './errors.js';
export * from '../types/index.js';
