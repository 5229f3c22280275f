import { describe, expect, it } from 'vitest';

import { animateShapes, createSeededRandom, erode, traceAll } from '@domain/squiggle/index.js';

import { blankRaster, CLEAR, fillRect } from '../../../support/rasters.js';

describe('erode, trace and animate', () => {
  it('turns a drawn square into one outline replayed on every frame', () => {
    const raster = blankRaster(10, 10);
    fillRect(raster, 3, 3, 6, 6);

    const shapes = traceAll(erode(raster, CLEAR), CLEAR);
    const frames = animateShapes(
      shapes,
      { sloppiness: 0, shakiness: 0, shakyFrequency: 1, frameCount: 3 },
      createSeededRandom(2),
    );

    expect(shapes).toHaveLength(1);
    expect(shapes[0]).toHaveLength(23);
    expect(shapes[0]?.[0]).toEqual({ x: 7, y: 7 });
    expect(frames).toEqual([shapes, shapes, shapes]);
    expect(raster.countColor(CLEAR)).toBe(84);
  });
});
