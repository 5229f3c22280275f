import type { IndexedRaster } from '../value-objects/raster.js';

export interface AnimationEncodingOptions {
  readonly frameDelayMs: number;
  readonly loop: boolean;
}

export interface AnimationEncoder {
  readonly mimeType: string;
  assembleAnimation(frames: readonly IndexedRaster[], options: AnimationEncodingOptions): Promise<Buffer>;
}
