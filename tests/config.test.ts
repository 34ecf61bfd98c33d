// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import {
  DEFAULT_CONFIG_DIR,
  expandHome,
  getConfigDir,
  getExampleConfig,
  initConfig,
  loadConfig,
  loadGlobalConfig,
  loadProfileConfig,
  mergeConfig,
  mergeFileConfigs,
  normalizeLegacyActivation,
  profileFileName,
  readConfigFile,
  resolveEnvActivation,
  validateFileConfig,
  validateRequired,
} from '../src/config/index.js';
import { ConfigError } from '../src/errors.js';
import { makeTempDir, removeTempDir } from './helpers/temp-tree.js';

describe('validateFileConfig', () => {
  it('accepts a complete config', () => {
    const raw = {
      defaultProjectsPaths: ['~/projects'],
      projectPath: '~/work',
      multipleSubprojects: false,
      excludeDirs: ['node_modules'],
      excludePrefixes: ['.'],
      dependencyManagers: [{ name: 'poetry', marker: 'poetry.lock', activation: 'poetry shell' }],
      customCommands: ['git status'],
      editor: 'code',
      envActivation: 'ask',
      terminal: 'kitty',
    };

    const { config, problems } = validateFileConfig(raw);

    expect(problems).toEqual([]);
    expect(config).toEqual(raw);
  });

  it('rejects a non-object', () => {
    expect(validateFileConfig(['editor']).problems).toEqual(['config must be a JSON object']);
  });

  it('ignores unknown fields', () => {
    expect(validateFileConfig({ editor: 'vim', colour: 'blue' })).toEqual({
      config: { editor: 'vim' },
      problems: [],
    });
  });

  it('collects every problem', () => {
    const { problems } = validateFileConfig({
      defaultProjectsPaths: '~/projects',
      excludeDirs: ['ok', 3],
      editor: '',
      envActivation: 'always',
      multipleSubprojects: 'yes',
    });

    expect(problems).toEqual([
      'defaultProjectsPaths must be an array of strings',
      'multipleSubprojects must be true or false',
      'excludeDirs[1] must be a string',
      'editor must be a non-empty string',
      'envActivation must be one of: skip, auto, ask',
    ]);
  });

  it('rejects an empty exclude prefix', () => {
    expect(validateFileConfig({ excludePrefixes: ['.', ''] }).problems).toEqual([
      'excludePrefixes[1] is empty and would exclude every directory',
    ]);
  });

  it('requires an activation or an invocation prefix on each manager', () => {
    const { config, problems } = validateFileConfig({
      dependencyManagers: [
        { name: 'docker', marker: 'Dockerfile', activation: null, invocationPrefix: 'docker exec x' },
        { name: 'broken', marker: 'x.lock', activation: null, invocationPrefix: '' },
        { marker: 'y.lock', activation: 'y on' },
      ],
    });

    expect(config.dependencyManagers).toEqual([
      { name: 'docker', marker: 'Dockerfile', invocationPrefix: 'docker exec x' },
    ]);
    expect(problems).toEqual([
      'dependencyManagers[1] needs either an activation command or a non-empty invocationPrefix',
      'dependencyManagers[2].name must be a non-empty string',
    ]);
  });

  it('reads the older activation flags', () => {
    expect(validateFileConfig({ autoRunCommandsInEnv: false, askForEnvActivation: true }).config).toEqual({
      autoRunCommandsInEnv: false,
      askForEnvActivation: true,
    });
  });
});

describe('validateRequired', () => {
  it('requires an editor', () => {
    expect(validateRequired({ defaultProjectsPaths: ['~/p'] }, { kind: 'fuzzy' })).toEqual(['editor is required']);
  });

  it('requires search roots for --find', () => {
    expect(validateRequired({ editor: 'code', defaultProjectsPaths: [] }, { kind: 'fuzzy' })).toEqual([
      'defaultProjectsPaths must list at least one path for --find',
    ]);
  });

  it('requires projectPath for --profile', () => {
    expect(validateRequired({ editor: 'code' }, { kind: 'direct', profile: 'work' })).toEqual([
      'projectPath is required for --profile work',
    ]);
  });
});

describe('mergeFileConfigs', () => {
  it('lets profile fields win and keeps the rest', () => {
    expect(
      mergeFileConfigs(
        { editor: 'code', excludeDirs: ['node_modules'], terminal: 'kitty' },
        { editor: 'vim', projectPath: '~/work' }
      )
    ).toEqual({ editor: 'vim', excludeDirs: ['node_modules'], terminal: 'kitty', projectPath: '~/work' });
  });

  it('replaces lists rather than concatenating them', () => {
    expect(mergeFileConfigs({ excludeDirs: ['a'] }, { excludeDirs: ['b'] }).excludeDirs).toEqual(['b']);
  });

  it('handles missing files', () => {
    expect(mergeFileConfigs(null, null)).toEqual({});
    expect(mergeFileConfigs(null, { editor: 'vim' })).toEqual({ editor: 'vim' });
  });

  it('lets a profile legacy flag override the global envActivation', () => {
    expect(mergeFileConfigs({ envActivation: 'ask' }, { autoRunCommandsInEnv: true })).toEqual({
      envActivation: 'auto',
    });
  });

  it('keeps the global envActivation when the profile says nothing about it', () => {
    expect(mergeFileConfigs({ askForEnvActivation: true }, { editor: 'vim' })).toEqual({
      envActivation: 'ask',
      editor: 'vim',
    });
  });
});

describe('normalizeLegacyActivation', () => {
  it('turns the older flags into envActivation', () => {
    expect(normalizeLegacyActivation({ autoRunCommandsInEnv: true, askForEnvActivation: true })).toEqual({
      envActivation: 'auto',
    });
    expect(normalizeLegacyActivation({ askForEnvActivation: true, editor: 'vim' })).toEqual({
      envActivation: 'ask',
      editor: 'vim',
    });
  });

  it('keeps an explicit envActivation', () => {
    expect(normalizeLegacyActivation({ envActivation: 'skip', autoRunCommandsInEnv: true })).toEqual({
      envActivation: 'skip',
    });
  });

  it('drops flags that are off', () => {
    expect(normalizeLegacyActivation({ autoRunCommandsInEnv: false })).toEqual({});
  });
});

describe('resolveEnvActivation', () => {
  it('prefers envActivation', () => {
    expect(resolveEnvActivation({ envActivation: 'skip', autoRunCommandsInEnv: true })).toBe('skip');
  });

  it('maps the older flags with auto winning', () => {
    expect(resolveEnvActivation({ autoRunCommandsInEnv: true, askForEnvActivation: true })).toBe('auto');
    expect(resolveEnvActivation({ askForEnvActivation: true })).toBe('ask');
  });

  it('defaults to skip', () => {
    expect(resolveEnvActivation({})).toBe('skip');
  });
});

describe('mergeConfig', () => {
  it('fills defaults and expands home', () => {
    const config = mergeConfig({ editor: 'code', defaultProjectsPaths: ['~/projects', '/srv'] }, { kind: 'fuzzy' }, {}, '/home/tester');

    expect(config).toEqual({
      defaultProjectsPaths: ['/home/tester/projects', '/srv'],
      projectPath: null,
      multipleSubprojects: true,
      excludeDirs: [],
      excludePrefixes: [],
      dependencyManagers: [],
      customCommands: [],
      editor: 'code',
      envActivation: 'skip',
      terminal: 'gnome-terminal',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('applies terminal overrides from the command line', () => {
    const fileConfig = { editor: 'code', projectPath: '~/work', terminal: 'kitty' };
    const mode = { kind: 'direct', profile: 'work' } as const;

    expect(mergeConfig(fileConfig, mode, {}, '/home/tester').terminal).toBe('kitty');
    expect(mergeConfig(fileConfig, mode, { terminal: 'konsole' }, '/home/tester').terminal).toBe('konsole');
    expect(mergeConfig(fileConfig, mode, { terminal: 'konsole', inline: true }, '/home/tester').terminal).toBe(
      'inline'
    );
    expect(mergeConfig(fileConfig, mode, {}, '/home/tester').projectPath).toBe('/home/tester/work');
  });

  it('throws ConfigError listing missing fields', () => {
    let caught: unknown;
    try {
      mergeConfig({}, { kind: 'fuzzy' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.getFullMessage()).toBe(
      'Invalid configuration\n  - editor is required\n  - defaultProjectsPaths must list at least one path for --find'
    );
  });
});

describe('config utils', () => {
  it('expands a leading tilde only', () => {
    expect(expandHome('~', '/home/tester')).toBe('/home/tester');
    expect(expandHome('~/code', '/home/tester')).toBe('/home/tester/code');
    expect(expandHome('/srv/~code', '/home/tester')).toBe('/srv/~code');
    expect(expandHome('~other/code', '/home/tester')).toBe('~other/code');
  });

  it('adds .json to profile names that lack it', () => {
    expect(profileFileName('work')).toBe('work.json');
    expect(profileFileName('work.json')).toBe('work.json');
  });

  it('writes an example config that validates', () => {
    const { problems } = validateFileConfig(JSON.parse(getExampleConfig()));
    expect(problems).toEqual([]);
  });
});

describe('config files', () => {
  let configDir: string;

  beforeEach(async () => {
    configDir = await makeTempDir('config');
    fs.mkdirSync(path.join(configDir, 'profiles'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await removeTempDir(configDir);
  });

  function writeJson(relativePath: string, value: unknown): void {
    fs.writeFileSync(path.join(configDir, relativePath), JSON.stringify(value));
  }

  describe('getConfigDir', () => {
    it('prefers the explicit directory, then the environment', () => {
      vi.stubEnv('PROJLOAD_CONFIG_DIR', '/env/dir');
      expect(getConfigDir('/explicit')).toBe('/explicit');
      expect(getConfigDir()).toBe('/env/dir');
    });

    it('falls back to the default directory', () => {
      expect(getConfigDir()).toBe(DEFAULT_CONFIG_DIR);
    });
  });

  it('treats a missing global config as empty', () => {
    expect(loadGlobalConfig(configDir)).toEqual({ config: null, configPath: null });
  });

  it('reports invalid JSON with the file path', () => {
    const configPath = path.join(configDir, 'config.json');
    fs.writeFileSync(configPath, '{ "editor": ');

    expect(() => readConfigFile(configPath)).toThrow(ConfigError);
    try {
      readConfigFile(configPath);
    } catch (error) {
      expect(error instanceof ConfigError && error.configPath).toBe(configPath);
      expect(error instanceof Error && error.message.startsWith('Failed to parse config: ')).toBe(true);
    }
  });

  it('reports invalid fields with their problems', () => {
    writeJson('config.json', { editor: 42 });

    expect(() => loadGlobalConfig(configDir)).toThrow('Invalid configuration');
  });

  it('fails for an unknown profile', () => {
    expect(() => loadProfileConfig('ghost', configDir)).toThrow('Profile "ghost" not found');
  });

  it('loads a profile given with its .json suffix', () => {
    writeJson('profiles/work.json', { projectPath: '/work' });
    expect(loadProfileConfig('work.json', configDir).config).toEqual({ projectPath: '/work' });
  });

  it('merges the profile over the global config for --profile', () => {
    writeJson('config.json', { editor: 'code', envActivation: 'ask', excludePrefixes: ['.'] });
    writeJson('profiles/work.json', { projectPath: '/work', editor: 'vim' });

    const config = loadConfig({ kind: 'direct', profile: 'work' }, {}, configDir);

    expect(config.projectPath).toBe('/work');
    expect(config.editor).toBe('vim');
    expect(config.envActivation).toBe('ask');
    expect(config.excludePrefixes).toEqual(['.']);
  });

  it('applies a profile legacy flag over the global envActivation', () => {
    writeJson('config.json', { editor: 'code', envActivation: 'ask' });
    writeJson('profiles/work.json', { projectPath: '/work', autoRunCommandsInEnv: true });

    expect(loadConfig({ kind: 'direct', profile: 'work' }, {}, configDir).envActivation).toBe('auto');
  });

  it('uses only the global config for --find', () => {
    writeJson('config.json', { editor: 'code', defaultProjectsPaths: ['/srv/projects'] });
    writeJson('profiles/work.json', { editor: 'vim' });

    const config = loadConfig({ kind: 'fuzzy' }, { inline: true }, configDir);

    expect(config.editor).toBe('code');
    expect(config.defaultProjectsPaths).toEqual(['/srv/projects']);
    expect(config.terminal).toBe('inline');
  });

  describe('initConfig', () => {
    it('writes the example config and the profiles directory', async () => {
      const dir = path.join(configDir, 'fresh');

      const result = initConfig(dir);

      expect(result).toEqual({ success: true, path: path.join(dir, 'config.json') });
      expect(fs.readFileSync(path.join(dir, 'config.json'), 'utf-8')).toBe(getExampleConfig());
      expect(fs.statSync(path.join(dir, 'profiles')).isDirectory()).toBe(true);
    });

    it('does not overwrite an existing config', () => {
      writeJson('config.json', { editor: 'vim' });

      expect(initConfig(configDir)).toEqual({
        success: false,
        path: path.join(configDir, 'config.json'),
        error: 'Config file already exists',
      });
      expect(JSON.parse(fs.readFileSync(path.join(configDir, 'config.json'), 'utf-8'))).toEqual({ editor: 'vim' });
    });
  });
});
