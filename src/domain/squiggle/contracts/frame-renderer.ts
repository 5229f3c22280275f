import type { Frame } from '../value-objects/geometry.js';
import type { IndexedRaster, RgbColor } from '../value-objects/raster.js';

export type DrawMode = 'fill' | 'outline';

export interface RenderFrameRequest {
  readonly width: number;
  readonly height: number;
  readonly shapes: Frame;
  readonly inkColor: RgbColor;
  readonly backgroundColor: RgbColor;
  readonly drawMode: DrawMode;
}

export interface FrameRenderer {
  /**
   * Draws every shape with at least three points; smaller shapes are skipped.
   * The result's palette is `[backgroundColor, inkColor]`.
   */
  renderFrame(request: RenderFrameRequest): IndexedRaster;
}
