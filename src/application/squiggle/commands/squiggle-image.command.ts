import type { SquiggleImagePayload } from '../dto/squiggle-image.dto.js';

export class SquiggleImageCommand {
  public readonly payload: SquiggleImagePayload;

  public constructor(payload: SquiggleImagePayload) {
    this.payload = payload;
  }
}
