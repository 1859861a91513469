import { buildDefaultSchema } from '@unitwright/core';
import type { BuildMode } from '../cli/mode.js';
import { logger } from '../logger.js';
import { type CommandContext, confirmWritten } from './context.js';

export function buildSchema(mode: BuildMode, ctx: CommandContext): void {
  buildDefaultSchema(mode.schemaPath);
  confirmWritten(mode.schemaPath);
  logger.debug({ schema: mode.schemaPath }, 'default schema written');
  ctx.log(ctx.style.render('success', 'Default schema built successfully.'));
}
