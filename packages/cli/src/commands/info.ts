import { DESCRIPTION, PROGRAM_NAME, VERSION } from '../version.js';
import type { CommandContext } from './context.js';

export function showInfo(ctx: CommandContext): void {
  const { config, style } = ctx;
  const rows: Array<[string, string]> = [
    ['Configuration', config.configPath],
    ['Schema directory', config.schemaDir],
    ['Unit directory', config.unitDir],
    ['System unit directories', config.systemUnitDirs.join(', ')],
    ['Editor', config.editor],
  ];
  const width = Math.max(...rows.map(([label]) => label.length)) + 1;

  ctx.log(`${style.render('bold', PROGRAM_NAME)} ${VERSION}`);
  ctx.log(DESCRIPTION);
  ctx.log('');
  for (const [label, value] of rows) {
    ctx.log(`${style.render('info', `${label}:`.padEnd(width))} ${value}`);
  }
}
