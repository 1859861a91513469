import { ArgumentError, UserAbortError } from '@unitwright/core';
import { buildSchema } from '../commands/build.js';
import type { CommandContext, InteractiveContext } from '../commands/context.js';
import { createService } from '../commands/create.js';
import { deleteService } from '../commands/delete.js';
import { editService } from '../commands/edit.js';
import { showInfo } from '../commands/info.js';
import { ExitCode, exitCodeFor } from '../exit-codes.js';
import { logger } from '../logger.js';
import type { Prompter } from '../prompt/types.js';
import { checkPrivileges } from '../system/privilege.js';
import { PROGRAM_NAME, VERSION } from '../version.js';
import { parseArgs, usage } from './args.js';
import { type Mode, resolveMode } from './mode.js';

export interface Runtime extends CommandContext {
  createPrompter: () => Prompter;
}

async function withPrompter(
  runtime: Runtime,
  action: (ctx: InteractiveContext) => Promise<void>,
): Promise<void> {
  const prompter = runtime.createPrompter();
  try {
    await action({ ...runtime, prompter });
  } finally {
    prompter.close();
  }
}

async function dispatch(mode: Mode, runtime: Runtime): Promise<void> {
  switch (mode.kind) {
    case 'info':
      showInfo(runtime);
      return;
    case 'build':
      buildSchema(mode, runtime);
      return;
    case 'edit':
      editService(mode, runtime);
      return;
    case 'delete':
      await withPrompter(runtime, (ctx) => deleteService(mode, ctx));
      return;
    case 'create':
      await withPrompter(runtime, (ctx) => createService(mode, ctx));
      return;
  }
}

function handleError(err: unknown, runtime: Runtime): number {
  const { style } = runtime;

  if (err instanceof UserAbortError) {
    runtime.log('\nAborting.');
    return ExitCode.UserAbort;
  }

  const code = exitCodeFor(err);
  if (code !== undefined && err instanceof Error) {
    logger.debug({ err }, 'command failed');
    runtime.error(`${style.render('error', 'Error:')} ${err.message}`);
    if (err instanceof ArgumentError) {
      runtime.error(style.render('muted', `Run '${PROGRAM_NAME} --help' for usage.`));
    }
    return code;
  }

  if (runtime.config.trace) throw err;
  logger.error({ err }, 'unexpected failure');
  runtime.error(style.render('error', 'A global exception has been caught.'));
  runtime.error(style.render('muted', 'Set UNITWRIGHT_TRACE=1 to see the full error.'));
  return ExitCode.GlobalError;
}

/**
 * One invocation: parse flags, pick a mode, check the environment, then
 * run the command. Resolves with the process exit code.
 */
export async function run(argv: readonly string[], runtime: Runtime): Promise<number> {
  try {
    const raw = parseArgs(argv);
    if (raw.help) {
      runtime.log(usage());
      return ExitCode.Success;
    }
    if (raw.version) {
      runtime.log(`${PROGRAM_NAME} ${VERSION}`);
      return ExitCode.Success;
    }

    const mode = resolveMode(raw, runtime.config);
    logger.debug({ mode }, 'mode resolved');

    if (mode.kind !== 'info') {
      if (mode.kind !== 'build') runtime.manager.version();
      checkPrivileges(mode, runtime.config, runtime.uid);
    }

    await dispatch(mode, runtime);
    return ExitCode.Success;
  } catch (err: unknown) {
    return handleError(err, runtime);
  }
}
