import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir, homedir } from 'os';
import { join } from 'path';
import {
  getDefaultProjectConfigPath,
  getUserBasePath,
  getUserDir,
  resolveMergedSyncConfig,
} from '../config-loader.js';

describe('config-loader', () => {
  let workDir: string;
  let userDir: string;
  let previousHome: string | undefined;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'disasm-sync-config-'));
    userDir = join(workDir, 'home');
    mkdirSync(userDir);
    previousHome = process.env.DISASM_SYNC_HOME;
    process.env.DISASM_SYNC_HOME = userDir;
  });

  afterEach(() => {
    if (previousHome === undefined) {
      delete process.env.DISASM_SYNC_HOME;
    } else {
      process.env.DISASM_SYNC_HOME = previousHome;
    }
    rmSync(workDir, { recursive: true, force: true });
  });

  it('resolves the user directory from DISASM_SYNC_HOME', () => {
    expect(getUserDir()).toBe(userDir);
    expect(getUserBasePath()).toBe(join(userDir, '.disasm-sync.json'));
  });

  it('falls back to ~/.disasm-sync', () => {
    process.env.DISASM_SYNC_HOME = '  ';

    expect(getUserDir()).toBe(join(homedir(), '.disasm-sync'));
  });

  it('defaults the project file to the working directory', () => {
    expect(getDefaultProjectConfigPath('/work/project')).toBe('/work/project/.disasm-sync.json');
  });

  it('returns the defaults without any file', () => {
    const projectPath = join(workDir, '.disasm-sync.json');

    const { config, sources } = resolveMergedSyncConfig(projectPath);

    expect(config).toEqual({
      viewerHost: '127.0.0.1',
      viewerPort: 18888,
      pcRegisterNames: ['pc', 'rip', 'eip', 'r15'],
      retryIntervalMs: 3000,
      autoEnable: false,
    });
    expect(sources).toEqual([]);
  });

  it('lets the project file override the user file', () => {
    writeFileSync(
      join(userDir, '.disasm-sync.json'),
      JSON.stringify({ viewerPort: 19000, pcRegisterNames: ['pc', 'x30'], autoEnable: true }),
    );
    const projectPath = join(workDir, '.disasm-sync.json');
    writeFileSync(projectPath, JSON.stringify({ viewerPort: 19500, pcRegisterNames: ['rip'] }));

    const { config, sources } = resolveMergedSyncConfig(projectPath);

    expect(config.viewerPort).toBe(19500);
    expect(config.pcRegisterNames).toEqual(['rip']);
    expect(config.autoEnable).toBe(true);
    expect(sources).toEqual([join(userDir, '.disasm-sync.json'), projectPath]);
  });

  it('rejects an invalid merged configuration', () => {
    const projectPath = join(workDir, '.disasm-sync.json');
    writeFileSync(projectPath, JSON.stringify({ retryIntervalMs: -5 }));

    expect(() => resolveMergedSyncConfig(projectPath)).toThrow();
  });

  it('surfaces malformed JSON', () => {
    const projectPath = join(workDir, '.disasm-sync.json');
    writeFileSync(projectPath, '{ "viewerPort": ');

    expect(() => resolveMergedSyncConfig(projectPath)).toThrow(SyntaxError);
  });
});
