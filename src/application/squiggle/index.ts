export * from './commands/squiggle-image.command.js';
export * from './dto/squiggle-image.dto.js';
export * from './handlers/squiggle-image.handler.js';
