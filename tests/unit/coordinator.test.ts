/**
 * Unit Tests: Run coordinator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readlinkSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runReconcile, KIND_ORDER, type RunOptions } from '../../src/coordinator/index.js';
import type { SystemConfig } from '../../src/config/types.js';
import { PreconditionNotFoundError } from '../../src/errors.js';
import { createLogger, silentLogger } from '../../src/utils/logger.js';
import { FakeHost } from '../fixtures/fake-host.js';

let host: FakeHost;
let root: string;
let options: RunOptions;

beforeEach(() => {
  host = new FakeHost();
  root = realpathSync(mkdtempSync(join(tmpdir(), 'hostsync-run-')));
  mkdirSync(join(root, 'dotfiles'));
  mkdirSync(join(root, 'home'));
  writeFileSync(join(root, 'dotfiles', '.zshrc'), '# zsh\n');
  options = { dotfilesDir: join(root, 'dotfiles'), home: join(root, 'home') };
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

const deps = () => ({ executor: host, logger: silentLogger });

describe('runReconcile', () => {
  it('skips every kind without a section', () => {
    const report = runReconcile({}, options, deps());

    expect(report).toEqual({
      dryRun: false,
      changed: false,
      outcomes: KIND_ORDER.map((kind) => ({ kind, status: 'skipped', changes: [], actions: [], warnings: [] })),
    });
    expect(host.calls).toEqual([]);
  });

  it('checks programs, plans and applies each kind in order', () => {
    const config: SystemConfig = {
      vscode: { extensions: ['a.b'] },
      brew: { formulae: ['jq'], casks: [] },
    };

    const report = runReconcile(config, options, deps());

    expect(host.commandLines()).toEqual([
      'which brew',
      'brew leaves',
      'brew list --cask',
      'brew install jq',
      'which code',
      'code --list-extensions',
      'code --install-extension a.b',
    ]);
    expect(report.changed).toBe(true);
    expect(report.outcomes.map((o) => `${o.kind}:${o.status}`)).toEqual([
      'brew:changed',
      'mas:skipped',
      'dotfiles:skipped',
      'vscode:changed',
      'macos:skipped',
    ]);
    expect(report.outcomes[0]?.actions).toEqual(['installed formula jq']);
  });

  it('plans without applying in a dry run', () => {
    const config: SystemConfig = {
      brew: { formulae: ['jq'], casks: [] },
      dotfiles: { files: [{ kind: 'implicit', path: '.zshrc' }] },
      macos: { dock: { autohide: true } },
    };

    const report = runReconcile(config, { ...options, dryRun: true }, deps());

    expect(report.dryRun).toBe(true);
    expect(report.changed).toBe(false);
    expect(host.mutations()).toEqual([]);
    expect(report.outcomes.filter((o) => o.status === 'planned').map((o) => o.changes.length)).toEqual([1, 1, 1]);
  });

  it('converges: a second run changes nothing', () => {
    const config: SystemConfig = {
      brew: { formulae: ['jq'], casks: ['firefox'] },
      mas: { apps: [{ name: 'Amphetamine', id: '937984704' }] },
      dotfiles: { files: [{ kind: 'implicit', path: '.zshrc' }] },
      vscode: { extensions: ['Foo.Bar'] },
      macos: { dock: { 'icon-size': 48 }, system: { 'natural-scrolling': false } },
    };

    expect(runReconcile(config, options, deps()).changed).toBe(true);
    expect(readlinkSync(join(root, 'home', '.zshrc'))).toBe(join(root, 'dotfiles', '.zshrc'));
    const mutations = host.mutations().length;

    const second = runReconcile(config, options, deps());

    expect(second.changed).toBe(false);
    expect(second.outcomes.map((o) => o.status)).toEqual([
      'unchanged',
      'unchanged',
      'unchanged',
      'unchanged',
      'unchanged',
    ]);
    expect(host.mutations()).toHaveLength(mutations);
  });

  it('stops at a missing program before planning that kind', () => {
    host.missingPrograms.add('mas');
    const config: SystemConfig = {
      brew: { formulae: [], casks: [] },
      mas: { apps: [{ name: 'Amphetamine', id: '937984704' }] },
      vscode: { extensions: ['a.b'] },
    };

    expect(() => runReconcile(config, options, deps())).toThrow(PreconditionNotFoundError);
    expect(() => runReconcile(config, options, deps())).toThrow('Program not found in PATH: mas');
    expect(host.commandLines()).not.toContain('mas list');
    expect(host.commandLines()).not.toContain('which code');
  });

  it('logs the failing kind before propagating the error', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'error', timestamps: false, write: (line) => lines.push(line) });
    host.missingPrograms.add('mas');

    expect(() =>
      runReconcile({ mas: { apps: [{ name: 'Amphetamine', id: '937984704' }] } }, options, { executor: host, logger })
    ).toThrow(PreconditionNotFoundError);
    expect(lines).toEqual([
      '[ERROR] Reconciling mas failed {"kind":"mas"} \n  Error: PreconditionNotFoundError: Program not found in PATH: mas',
    ]);
  });

  it('carries restart warnings into the outcome and the log', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'warn', timestamps: false, write: (line) => lines.push(line) });
    host.override('killall Dock', { exitCode: 1, stderr: 'No matching processes' });

    const report = runReconcile({ macos: { dock: { autohide: true } } }, options, { executor: host, logger });

    const macos = report.outcomes.find((o) => o.kind === 'macos');
    expect(macos?.warnings).toEqual(['killall Dock exited 1: No matching processes']);
    expect(lines).toContain(
      '[WARN] killall Dock exited 1: No matching processes {"kind":"macos"}'
    );
  });
});
