import { z } from 'zod';

const channel = z.number().int().min(0).max(255);

export const rgbColorSchema = z.object({
  r: channel,
  g: channel,
  b: channel,
});

const white = { r: 255, g: 255, b: 255 };
const black = { r: 0, g: 0, b: 0 };

export const tracingOptionsSchema = z.object({
  blotRadius: z.number().int().min(0).max(32).default(1),
  clearColor: rgbColorSchema.default(white),
  matte: rgbColorSchema.default(white),
});

export const animationOptionsSchema = z.object({
  sloppiness: z.number().min(0).max(1).default(0.1),
  shakiness: z.number().int().min(0).default(1),
  shakyFrequency: z.number().positive().default(0.25),
  frameCount: z.number().int().min(1).max(500).default(5),
  seed: z.number().int().optional(),
});

export const outputOptionsSchema = z.object({
  inkColor: rgbColorSchema.default(black),
  backgroundColor: rgbColorSchema.default(white),
  frameDelayMs: z.number().int().min(10).max(60_000).default(100),
  loop: z.boolean().default(true),
  drawMode: z.enum(['fill', 'outline']).default('fill'),
});

export const squiggleImageCommandSchema = z.object({
  inputPath: z.string().min(1),
  outputPath: z.string().min(1),
  tracing: tracingOptionsSchema.default({}),
  animation: animationOptionsSchema.default({}),
  output: outputOptionsSchema.default({}),
});

/** What callers may send; every option has a default. */
export type SquiggleImagePayload = z.input<typeof squiggleImageCommandSchema>;

export type SquiggleImageRequest = z.infer<typeof squiggleImageCommandSchema>;
