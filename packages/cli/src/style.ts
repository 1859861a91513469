import pc from 'picocolors';

export type StyleTag =
  | 'bold'
  | 'section'
  | 'key'
  | 'success'
  | 'warning'
  | 'error'
  | 'info'
  | 'muted';

/** Immutable formatting context, computed once at startup. */
export interface Style {
  readonly enabled: boolean;
  render(tag: StyleTag, text: string): string;
}

export interface TerminalProbe {
  isTTY: boolean | undefined;
  env: NodeJS.ProcessEnv;
}

/** ANSI output when writing to a terminal or when TERM=ANSI; never with NO_COLOR. */
export function detectAnsiSupport({ isTTY, env }: TerminalProbe): boolean {
  if (env.NO_COLOR) return false;
  return isTTY === true || env.TERM === 'ANSI';
}

export function createStyle(enabled: boolean): Style {
  const colors = pc.createColors(enabled);
  const painters: Record<StyleTag, (text: string) => string> = {
    bold: colors.bold,
    section: (text) => colors.bold(colors.yellow(text)),
    key: (text) => colors.bold(colors.green(text)),
    success: colors.green,
    warning: colors.yellow,
    error: (text) => colors.bold(colors.red(text)),
    info: colors.blue,
    muted: colors.dim,
  };

  return Object.freeze({
    enabled,
    render: (tag: StyleTag, text: string) => painters[tag](text),
  });
}
