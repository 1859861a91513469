import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  type FieldPrompt,
  LookupError,
  ServiceManagerError,
  UserAbortError,
} from '@unitwright/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CliConfig } from '../config.js';
import type { Prompter } from '../prompt/types.js';
import type { EditorLauncher } from '../services/editor.js';
import type { ServiceManagerClient, ServiceResult } from '../services/systemctl.js';
import { createStyle } from '../style.js';
import { VERSION } from '../version.js';
import { type Runtime, run } from './run.js';

const TEMPLATE = [
  '[Unit]',
  'Description=Example',
  '',
  '[Service]',
  'ExecStart=/bin/true',
  'User=root',
  '',
  '[Install]',
  'WantedBy=multi-user.target',
  '',
].join('\n');

class FakeManager implements ServiceManagerClient {
  calls: string[] = [];
  fragments = new Map<string, string>();
  failing = new Set<string>();
  versionError: unknown = undefined;

  version(): number {
    this.calls.push('version');
    if (this.versionError) throw this.versionError;
    return 252;
  }

  fragmentPath(service: string): string {
    this.calls.push(`fragmentPath ${service}`);
    const fragment = this.fragments.get(service);
    if (!fragment) throw new LookupError(`Service ${service} is not known to systemd.`);
    return fragment;
  }

  reload(): ServiceResult {
    return this.record('daemon-reload');
  }

  enable(service: string): ServiceResult {
    return this.record(`enable ${service}`);
  }

  disable(service: string): ServiceResult {
    return this.record(`disable ${service}`);
  }

  start(service: string): ServiceResult {
    return this.record(`start ${service}`);
  }

  stop(service: string): ServiceResult {
    return this.record(`stop ${service}`);
  }

  private record(call: string): ServiceResult {
    this.calls.push(call);
    return this.failing.has(call)
      ? { success: false, message: `systemctl ${call} failed` }
      : { success: true, message: 'ok' };
  }
}

class FakeEditor implements EditorLauncher {
  opened: string[] = [];
  onOpen: (file: string) => void = () => {};

  open(file: string): ServiceResult {
    this.opened.push(file);
    this.onOpen(file);
    return { success: true, message: 'Closed fake.' };
  }
}

class ScriptedPrompter implements Prompter {
  asked: string[] = [];
  questions: Array<[string, boolean]> = [];
  closed = false;

  constructor(
    private answers: string[],
    private confirms: boolean[],
  ) {}

  beginSection(): void {}

  async ask(field: FieldPrompt): Promise<string> {
    this.asked.push(field.key);
    const answer = this.answers.shift();
    if (answer === undefined) throw new UserAbortError();
    return answer;
  }

  async confirm(question: string, defaultYes: boolean): Promise<boolean> {
    this.questions.push([question, defaultYes]);
    const answer = this.confirms.shift();
    if (answer === undefined) throw new UserAbortError();
    return answer;
  }

  close(): void {
    this.closed = true;
  }
}

let tmpDir: string;
let config: CliConfig;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'unitwright-run-'));
  config = {
    configPath: path.join(tmpDir, 'config.json'),
    editor: 'vim',
    unitDir: path.join(tmpDir, 'units'),
    schemaDir: path.join(tmpDir, 'schemas'),
    systemUnitDirs: [path.join(tmpDir, 'vendor')],
    trace: false,
    logLevel: 'silent',
  };
  for (const dir of [config.unitDir, config.schemaDir, ...config.systemUnitDirs]) {
    fs.mkdirSync(dir);
  }
  fs.writeFileSync(path.join(config.schemaDir, 'service-config'), TEMPLATE);
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function setup(options: { uid?: number; answers?: string[]; confirms?: boolean[] } = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const manager = new FakeManager();
  const editor = new FakeEditor();
  const prompter = new ScriptedPrompter(options.answers ?? [], options.confirms ?? []);
  const runtime: Runtime = {
    config,
    style: createStyle(false),
    log: (msg) => out.push(msg),
    error: (msg) => err.push(msg),
    manager,
    editor,
    uid: options.uid ?? 0,
    createPrompter: () => prompter,
  };
  return { runtime, out, err, manager, editor, prompter };
}

describe('run: create', () => {
  it('writes the edited unit and enables and starts it as root', async () => {
    const ctx = setup({
      answers: ['My app', '/usr/bin/myapp', '', 'multi-user.target'],
      confirms: [false, true, true],
    });

    expect(await run(['myapp'], ctx.runtime)).toBe(0);

    expect(fs.readFileSync(path.join(config.unitDir, 'myapp.service'), 'utf-8')).toBe(
      [
        '[Unit]',
        'Description=My app',
        '',
        '[Service]',
        'ExecStart=/usr/bin/myapp',
        '',
        '[Install]',
        'WantedBy=multi-user.target',
        '',
        '# Automatically generated by unitwright.',
        '',
      ].join('\n'),
    );
    expect(ctx.prompter.asked).toEqual(['Description', 'ExecStart', 'User', 'WantedBy']);
    expect(ctx.prompter.questions).toEqual([
      ['Do you want to manually edit the new configuration?', false],
      ['Do you want to enable the service?', false],
      ['Do you want to start the service?', true],
    ]);
    expect(ctx.manager.calls).toEqual([
      'version',
      'daemon-reload',
      'enable myapp.service',
      'daemon-reload',
      'start myapp.service',
    ]);
    expect(ctx.out.at(-1)).toBe('Service created successfully.');
    expect(ctx.prompter.closed).toBe(true);
  });

  it('leaves out [Install] when its only key is left blank', async () => {
    const ctx = setup({ answers: ['a', '/bin/a', 'nobody', ''], confirms: [false, false, false] });
    expect(await run(['a'], ctx.runtime)).toBe(0);

    const text = fs.readFileSync(path.join(config.unitDir, 'a.service'), 'utf-8');
    expect(text).toBe(
      '[Unit]\nDescription=a\n\n[Service]\nExecStart=/bin/a\nUser=nobody\n\n# Automatically generated by unitwright.\n',
    );
  });

  it('opens the editor on the new file when asked', async () => {
    const ctx = setup({ answers: ['a', 'b', 'c', 'd'], confirms: [true, false, false] });
    expect(await run(['a'], ctx.runtime)).toBe(0);
    expect(ctx.editor.opened).toEqual([path.join(config.unitDir, 'a.service')]);
  });

  it('warns about a failed control command and carries on', async () => {
    const ctx = setup({ answers: ['a', 'b', 'c', 'd'], confirms: [false, true, false] });
    ctx.manager.failing.add('enable a.service');

    expect(await run(['a'], ctx.runtime)).toBe(0);
    expect(ctx.err).toEqual(['systemctl enable a.service failed']);
    expect(ctx.out.at(-1)).toBe('Service created successfully.');
  });

  it('writes elsewhere without root but does not offer enable or start', async () => {
    const elsewhere = path.join(tmpDir, 'elsewhere');
    fs.mkdirSync(elsewhere);
    const ctx = setup({ uid: 1000, answers: ['a', 'b', 'c', 'd'], confirms: [false] });

    expect(await run(['-d', elsewhere, 'a'], ctx.runtime)).toBe(0);
    expect(fs.existsSync(path.join(elsewhere, 'a.service'))).toBe(true);
    expect(ctx.prompter.questions).toHaveLength(1);
    expect(ctx.out).toContain(
      'No permissions to enable/start service. Need to run with root privileges.',
    );
    expect(ctx.manager.calls).toEqual(['version']);
  });

  it('announces and uses the short template', async () => {
    fs.writeFileSync(
      path.join(config.schemaDir, 'short_service-config'),
      '[Unit]\nDescription=Short\n\n[Service]\nExecStart=/bin/true\n',
    );
    const ctx = setup({ answers: ['s', '/bin/s'], confirms: [false, false, false] });

    expect(await run(['-s', 'short'], ctx.runtime)).toBe(0);
    expect(ctx.out[0]).toBe('Using short schema configuration.');
    expect(ctx.prompter.asked).toEqual(['Description', 'ExecStart']);
  });

  it('aborts without writing when input ends mid-session', async () => {
    const ctx = setup({ answers: ['My app'] });

    expect(await run(['myapp'], ctx.runtime)).toBe(5);
    expect(fs.existsSync(path.join(config.unitDir, 'myapp.service'))).toBe(false);
    expect(ctx.out).toEqual(['\nAborting.']);
    expect(ctx.prompter.closed).toBe(true);
  });

  it('removes the new unit file when aborted at a follow-up question', async () => {
    const ctx = setup({ answers: ['a', 'b', 'c', 'd'], confirms: [] });

    expect(await run(['myapp'], ctx.runtime)).toBe(5);
    expect(fs.existsSync(path.join(config.unitDir, 'myapp.service'))).toBe(false);
    expect(ctx.out).toEqual(['', '\nAborting.']);
    expect(ctx.manager.calls).toEqual(['version']);
  });

  it('restores the unit file it replaced when aborted', async () => {
    const destination = path.join(config.unitDir, 'myapp.service');
    fs.writeFileSync(destination, '[Unit]\nDescription=Before\n');
    const ctx = setup({ answers: ['a', 'b', 'c', 'd'], confirms: [false] });

    expect(await run(['myapp'], ctx.runtime)).toBe(5);
    expect(fs.readFileSync(destination, 'utf-8')).toBe('[Unit]\nDescription=Before\n');
  });

  it('disables a unit it enabled before an abort', async () => {
    const ctx = setup({ answers: ['a', 'b', 'c', 'd'], confirms: [false, true] });

    expect(await run(['a'], ctx.runtime)).toBe(5);
    expect(fs.existsSync(path.join(config.unitDir, 'a.service'))).toBe(false);
    expect(ctx.manager.calls).toEqual([
      'version',
      'daemon-reload',
      'enable a.service',
      'disable a.service',
      'daemon-reload',
    ]);
  });

  it('refuses to write into the unit directory without root', async () => {
    const ctx = setup({ uid: 1000 });

    expect(await run(['myapp'], ctx.runtime)).toBe(11);
    expect(ctx.err).toEqual([
      'Error: Insufficient permissions. You have to run unitwright as root (with sudo).',
    ]);
    expect(ctx.prompter.asked).toEqual([]);
  });

  it('fails with exit 9 when the template is missing', async () => {
    const ctx = setup();
    const missing = path.join(config.schemaDir, 'extended_service-config');

    expect(await run(['-x', 'myapp'], ctx.runtime)).toBe(9);
    expect(ctx.err).toEqual([`Error: Cannot read schema ${missing}: file not found`]);
  });
});

describe('run: delete', () => {
  it('stops, disables and removes a user-configured unit', async () => {
    const fragment = path.join(config.unitDir, 'web.service');
    fs.writeFileSync(fragment, TEMPLATE);
    const ctx = setup();
    ctx.manager.fragments.set('web.service', fragment);

    expect(await run(['--delete', 'web'], ctx.runtime)).toBe(0);
    expect(fs.existsSync(fragment)).toBe(false);
    expect(ctx.manager.calls).toEqual([
      'version',
      'fragmentPath web.service',
      'stop web.service',
      'disable web.service',
      'daemon-reload',
    ]);
    expect(ctx.prompter.questions).toEqual([]);
    expect(ctx.out).toEqual(['Deleted service.']);
  });

  it('keeps a vendor unit when the operator declines', async () => {
    const fragment = path.join(config.systemUnitDirs[0] ?? '', 'ssh.service');
    fs.writeFileSync(fragment, TEMPLATE);
    const ctx = setup({ confirms: [false] });
    ctx.manager.fragments.set('ssh.service', fragment);

    expect(await run(['--delete', 'ssh'], ctx.runtime)).toBe(0);
    expect(ctx.prompter.questions).toEqual([
      ['This is not a user-configured service, do you want to delete it anyway?', false],
    ]);
    expect(ctx.out).toEqual(['Aborting...']);
    expect(ctx.manager.calls).toEqual(['version', 'fragmentPath ssh.service']);
    expect(fs.existsSync(fragment)).toBe(true);
  });

  it('removes a vendor unit after an explicit yes', async () => {
    const fragment = path.join(config.systemUnitDirs[0] ?? '', 'ssh.service');
    fs.writeFileSync(fragment, TEMPLATE);
    const ctx = setup({ confirms: [true] });
    ctx.manager.fragments.set('ssh.service', fragment);

    expect(await run(['--delete', 'ssh.service'], ctx.runtime)).toBe(0);
    expect(fs.existsSync(fragment)).toBe(false);
  });

  it('fails with exit 10 for an unknown unit', async () => {
    const ctx = setup();
    expect(await run(['--delete', 'ghost'], ctx.runtime)).toBe(10);
    expect(ctx.err).toEqual(['Error: Service ghost.service is not known to systemd.']);
  });

  it('needs root', async () => {
    const ctx = setup({ uid: 1000 });
    expect(await run(['--delete', 'web'], ctx.runtime)).toBe(11);
    expect(ctx.manager.calls).toEqual(['version']);
  });
});

describe('run: edit', () => {
  it('opens the installed unit in the editor', async () => {
    const fragment = path.join(config.unitDir, 'web.service');
    fs.writeFileSync(fragment, TEMPLATE);
    const ctx = setup();
    ctx.manager.fragments.set('web.service', fragment);

    expect(await run(['--edit', 'web'], ctx.runtime)).toBe(0);
    expect(ctx.editor.opened).toEqual([fragment]);
    expect(ctx.out).toEqual(['Service edited successfully.']);
  });

  it('fails with exit 12 when the file is gone after editing', async () => {
    const fragment = path.join(config.unitDir, 'web.service');
    fs.writeFileSync(fragment, TEMPLATE);
    const ctx = setup();
    ctx.manager.fragments.set('web.service', fragment);
    ctx.editor.onOpen = (file) => fs.rmSync(file);

    expect(await run(['--edit', 'web'], ctx.runtime)).toBe(12);
    expect(ctx.err).toEqual([`Error: ${fragment} was not found after writing.`]);
  });
});

describe('run: build', () => {
  it('writes the default template without touching systemd', async () => {
    const ctx = setup({ uid: 1000 });
    const target = path.join(config.schemaDir, 'default-schema');

    expect(await run(['-b'], ctx.runtime)).toBe(0);
    expect(fs.readFileSync(target, 'utf-8').startsWith('[Unit]\nDescription=Example\n')).toBe(true);
    expect(ctx.out).toEqual(['Default schema built successfully.']);
    expect(ctx.manager.calls).toEqual([]);
  });

  it('refuses to replace an existing template', async () => {
    const target = path.join(config.schemaDir, 'default-schema');
    fs.writeFileSync(target, 'keep me\n');
    const ctx = setup();

    expect(await run(['--build'], ctx.runtime)).toBe(9);
    expect(ctx.err).toEqual([`Error: ${target} already exists.`]);
    expect(fs.readFileSync(target, 'utf-8')).toBe('keep me\n');
  });
});

describe('run: arguments and failures', () => {
  it('rejects conflicting flags before doing anything', async () => {
    const ctx = setup();
    expect(await run(['--build', 'myapp'], ctx.runtime)).toBe(6);
    expect(ctx.err).toEqual([
      'Error: The argument -b/--build cannot be used with service_name.',
      "Run 'unitwright --help' for usage.",
    ]);
    expect(ctx.manager.calls).toEqual([]);
  });

  it('rejects a service name with a slash', async () => {
    const ctx = setup();
    expect(await run(['a/b'], ctx.runtime)).toBe(6);
    expect(ctx.manager.calls).toEqual([]);
  });

  it('fails with exit 10 when systemd is unavailable', async () => {
    const ctx = setup();
    ctx.manager.versionError = new ServiceManagerError('systemd is not available.');
    expect(await run(['myapp'], ctx.runtime)).toBe(10);
    expect(ctx.err).toEqual(['Error: systemd is not available.']);
  });

  it('maps an unexpected failure to exit 8', async () => {
    const ctx = setup();
    ctx.manager.versionError = new TypeError('boom');
    expect(await run(['myapp'], ctx.runtime)).toBe(8);
    expect(ctx.err[0]).toBe('A global exception has been caught.');
  });

  it('rethrows an unexpected failure when tracing', async () => {
    config.trace = true;
    const ctx = setup();
    ctx.manager.versionError = new TypeError('boom');
    await expect(run(['myapp'], ctx.runtime)).rejects.toThrow('boom');
  });
});

describe('run: help, version and info', () => {
  it('prints usage', async () => {
    const ctx = setup();
    expect(await run(['--help'], ctx.runtime)).toBe(0);
    expect(ctx.out[0]?.startsWith('Usage: unitwright')).toBe(true);
  });

  it('prints the version', async () => {
    const ctx = setup();
    expect(await run(['-v'], ctx.runtime)).toBe(0);
    expect(ctx.out).toEqual([`unitwright ${VERSION}`]);
  });

  it('prints info without checking systemd or privileges', async () => {
    const ctx = setup({ uid: 1000 });
    expect(await run(['--info'], ctx.runtime)).toBe(0);
    expect(ctx.out[0]).toBe(`unitwright ${VERSION}`);
    expect(ctx.out).toContain(`Schema directory:        ${config.schemaDir}`);
    expect(ctx.manager.calls).toEqual([]);
  });
});
