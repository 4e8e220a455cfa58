export * from './cache-gate.js';
export * from './check-engine.js';
export * from './content-addresser.js';
export * from './context.js';
export * from './figure-spec.js';
export * from './instrument.js';
export * from './result-classifier.js';
export * from './script-runner.js';
export * from './transcript.js';
