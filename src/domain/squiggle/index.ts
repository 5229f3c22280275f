export * from './contracts/animation-encoder.js';
export * from './contracts/frame-renderer.js';
export * from './contracts/raster-source.js';
export * from './entities/squiggle-job.js';
export * from './services/contour-tracer.js';
export * from './services/eroder.js';
export * from './services/frame-animator.js';
export * from './services/shape-locator.js';
export * from './services/trace-driver.js';
export * from './value-objects/animation-parameters.js';
export * from './value-objects/direction.js';
export * from './value-objects/geometry.js';
export * from './value-objects/random-source.js';
export * from './value-objects/raster.js';
