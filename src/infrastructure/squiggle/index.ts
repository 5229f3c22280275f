export * from './encoder/gif-animation-encoder.js';
export * from './raster-source/image-raster-source.js';
export * from './renderer/canvas-frame-renderer.js';
