#!/usr/bin/env node

import { ConfigError } from '@unitwright/core';
import { run } from './cli/run.js';
import { type CliConfig, loadConfig } from './config.js';
import { ExitCode } from './exit-codes.js';
import { logger } from './logger.js';
import { createPrompter } from './prompt/index.js';
import { SpawnEditorLauncher } from './services/editor.js';
import { SystemctlClient } from './services/systemctl.js';
import { createStyle, detectAnsiSupport } from './style.js';
import { currentUid } from './system/privilege.js';

const style = createStyle(detectAnsiSupport({ isTTY: process.stdout.isTTY, env: process.env }));

function readConfig(): CliConfig | undefined {
  try {
    return loadConfig();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`${style.render('error', 'Error:')} ${err.message}`);
      return undefined;
    }
    throw err;
  }
}

async function main(): Promise<number> {
  const config = readConfig();
  if (!config) return ExitCode.ConfigError;
  logger.level = config.logLevel;

  return run(process.argv.slice(2), {
    config,
    style,
    log: console.log,
    error: console.error,
    manager: new SystemctlClient(),
    editor: new SpawnEditorLauncher(config.editor),
    uid: currentUid(),
    createPrompter: () => createPrompter(style),
  });
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
