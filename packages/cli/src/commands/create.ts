import path from 'node:path';
import {
  UserAbortError,
  type WrittenUnitFile,
  countKeys,
  editUnitModel,
  loadSchema,
  revertUnitFile,
  writeUnitFile,
} from '@unitwright/core';
import type { CreateMode } from '../cli/mode.js';
import { logger } from '../logger.js';
import { isPrivileged } from '../system/privilege.js';
import { type InteractiveContext, confirmWritten, reportResult } from './context.js';

function describeSchema(mode: CreateMode): string | undefined {
  if (mode.schema.kind === 'custom') {
    return `Using schema configuration from ${mode.schemaPath}.`;
  }
  if (mode.schema.preset === 'default') return undefined;
  return `Using ${mode.schema.preset} schema configuration.`;
}

/**
 * Walk the operator through a template, write the unit, then offer to
 * hand-edit, enable and start it.
 */
export async function createService(mode: CreateMode, ctx: InteractiveContext): Promise<void> {
  const { manager, prompter, style } = ctx;

  const notice = describeSchema(mode);
  if (notice) ctx.log(style.render('info', notice));

  const template = loadSchema(mode.schemaPath);
  logger.debug({ schema: mode.schemaPath, keys: countKeys(template) }, 'schema loaded');

  const model = await editUnitModel(template, prompter);
  const written = writeUnitFile(model, path.join(mode.outputDir, mode.service));
  logger.debug({ destination: written.destination, keys: countKeys(model) }, 'unit file written');
  ctx.log('');

  let enabled = false;
  try {
    if (await prompter.confirm('Do you want to manually edit the new configuration?', false)) {
      reportResult(ctx, ctx.editor.open(written.destination));
    }

    if (isPrivileged(ctx.uid)) {
      if (await prompter.confirm('Do you want to enable the service?', false)) {
        reportResult(ctx, manager.reload());
        reportResult(ctx, manager.enable(mode.service));
        enabled = true;
      }
      if (await prompter.confirm('Do you want to start the service?', true)) {
        reportResult(ctx, manager.reload());
        reportResult(ctx, manager.start(mode.service));
      }
    } else {
      ctx.log(
        style.render(
          'warning',
          'No permissions to enable/start service. Need to run with root privileges.',
        ),
      );
    }
  } catch (err: unknown) {
    if (err instanceof UserAbortError) rollBack(mode, ctx, written, enabled);
    throw err;
  }

  confirmWritten(written.destination);
  ctx.log(style.render('success', 'Service created successfully.'));
}

/** Undo an aborted create: disable what was enabled, then restore the unit file. */
function rollBack(
  mode: CreateMode,
  ctx: InteractiveContext,
  written: WrittenUnitFile,
  enabled: boolean,
): void {
  if (enabled) reportResult(ctx, ctx.manager.disable(mode.service));
  revertUnitFile(written);
  logger.debug({ destination: written.destination }, 'unit file reverted');
  if (enabled) reportResult(ctx, ctx.manager.reload());
}
