import type { EditMode } from '../cli/mode.js';
import { logger } from '../logger.js';
import { type CommandContext, confirmWritten, reportResult } from './context.js';

/** Open the installed unit file of `mode.service` in the configured editor. */
export function editService(mode: EditMode, ctx: CommandContext): void {
  const fragment = ctx.manager.fragmentPath(mode.service);
  logger.debug({ fragment, editor: ctx.config.editor }, 'opening editor');

  reportResult(ctx, ctx.editor.open(fragment));
  confirmWritten(fragment);
  ctx.log(ctx.style.render('success', 'Service edited successfully.'));
}
