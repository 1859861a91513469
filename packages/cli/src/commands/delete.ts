import fs from 'node:fs';
import path from 'node:path';
import { WriteError } from '@unitwright/core';
import type { DeleteMode } from '../cli/mode.js';
import { logger } from '../logger.js';
import { type InteractiveContext, reportResult } from './context.js';

export function isUnderDirectory(file: string, dir: string): boolean {
  const rel = path.relative(path.resolve(dir), path.resolve(file));
  return rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel);
}

/**
 * Stop, disable and remove an installed unit. Units shipped by the
 * distribution need an explicit yes first.
 */
export async function deleteService(mode: DeleteMode, ctx: InteractiveContext): Promise<void> {
  const { manager, style } = ctx;
  const fragment = manager.fragmentPath(mode.service);

  if (ctx.config.systemUnitDirs.some((dir) => isUnderDirectory(fragment, dir))) {
    const proceed = await ctx.prompter.confirm(
      style.render(
        'warning',
        'This is not a user-configured service, do you want to delete it anyway?',
      ),
      false,
    );
    if (!proceed) {
      ctx.log('Aborting...');
      return;
    }
  }

  reportResult(ctx, manager.stop(mode.service));
  reportResult(ctx, manager.disable(mode.service));

  try {
    fs.rmSync(fragment);
  } catch (err: unknown) {
    const code = (err as { code?: string }).code;
    const reason =
      code === 'EACCES' || code === 'EPERM'
        ? 'permission denied'
        : err instanceof Error
          ? err.message
          : String(err);
    throw new WriteError(`Cannot remove ${fragment}: ${reason}`, { cause: err });
  }
  logger.debug({ fragment }, 'unit file removed');

  reportResult(ctx, manager.reload());
  ctx.log(style.render('success', 'Deleted service.'));
}
