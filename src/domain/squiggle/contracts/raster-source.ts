import type { IndexedRaster, RgbaDecodeOptions } from '../value-objects/raster.js';

export type RasterLoadOptions = RgbaDecodeOptions;

export interface RasterSource {
  /** Rejects with a `raster.decode-failed` error for unreadable or unsupported input. */
  load(path: string, options?: RasterLoadOptions): Promise<IndexedRaster>;
}
