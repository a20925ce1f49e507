/**
 * CLI Tests
 *
 * Tests cover:
 * - Program creation and command registration
 * - Base command output and option parsers
 * - Formatter utilities
 * - Command handlers against a real build in a temp data directory
 *
 * @module cli/cli.test
 */

import { describe, it, expect, jest, beforeAll, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { createProgram } from './index.js';
import { BaseCommand, EXIT_CODES, createBaseCommand, exitCodeForError, getBaseCommand } from './base-command.js';
import { VERSION, getVersionInfo } from './version.js';
import { formatDuration, createStageProgress } from './formatters/progress.js';
import {
  formatErrorSummary,
  formatFileSize,
  formatPlan,
  formatQuickSummary,
  shortKey,
} from './formatters/build-summary.js';
import { getCommandHelp } from './commands/index.js';
import { parseFormat, parseProfile, parseStageNumber } from './commands/options.js';
import { handleBuild } from './commands/build.js';
import { handlePlan } from './commands/plan.js';
import { handleDockerfile } from './commands/dockerfile.js';
import { handleListBuilds, handleViewBuild, handleVerifyBuild } from './commands/builds/index.js';
import { handleInspectImage, handleListImages } from './commands/image.js';
import { handleClearCache, handleListCache } from './commands/cache.js';
import { handleExport } from './commands/export.js';
import { ConfigError, RecipeError, ResolutionError } from '../errors/index.js';
import { runBuild } from '../builder/build.js';
import { getStageFilePath } from '../storage/paths.js';
import { createProject } from '../../tests/fixtures/project.js';

beforeAll(() => {
  chalk.level = 0;
});

type ConsoleSpy = jest.SpiedFunction<typeof console.log>;

/** Parse the JSON printed by the most recent console.log call */
function lastJson(spy: ConsoleSpy): unknown {
  const call = spy.mock.calls.at(-1);
  return JSON.parse(String(call?.[0]));
}

function printed(spy: ConsoleSpy): string[] {
  return spy.mock.calls.map((call) => String(call[0]));
}

// ============================================================================
// Program Tests
// ============================================================================

describe('CLI Program', () => {
  it('should create a program with correct name and version', () => {
    const program = createProgram();

    expect(program.name()).toBe('provision');
    expect(program.version()).toBe(VERSION);
  });

  it('should have global options configured', () => {
    const optionNames = createProgram().options.map((o) => o.long);

    expect(optionNames).toEqual(['--version', '--verbose', '--quiet', '--no-color', '--data-dir']);
  });

  it('should register every command', () => {
    const program = createProgram();

    expect(program.commands.map((c) => c.name())).toEqual([
      'build',
      'plan',
      'dockerfile',
      'builds',
      'image',
      'cache',
      'export',
    ]);
  });

  it('should register subcommands', () => {
    const program = createProgram();
    const subcommands = (name: string) =>
      program.commands.find((c) => c.name() === name)?.commands.map((c) => c.name());

    expect(subcommands('builds')).toEqual(['list', 'view', 'verify']);
    expect(subcommands('image')).toEqual(['list', 'inspect']);
    expect(subcommands('cache')).toEqual(['list', 'clear']);
  });

  it('should list help for every command', () => {
    const help = getCommandHelp();

    expect(help).toHaveLength(11);
    expect(help.every((entry) => entry.description.length > 0)).toBe(true);
  });
});

describe('Version', () => {
  it('should format version info', () => {
    expect(getVersionInfo()).toBe(`image-provisioner v${VERSION}`);
  });
});

// ============================================================================
// BaseCommand Tests
// ============================================================================

describe('BaseCommand', () => {
  let consoleSpy: {
    log: ConsoleSpy;
    warn: jest.SpiedFunction<typeof console.warn>;
    error: jest.SpiedFunction<typeof console.error>;
  };
  const originalDataDir = process.env.PROVISIONER_DATA_DIR;

  beforeEach(() => {
    consoleSpy = {
      log: jest.spyOn(console, 'log').mockImplementation(() => {}),
      warn: jest.spyOn(console, 'warn').mockImplementation(() => {}),
      error: jest.spyOn(console, 'error').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    consoleSpy.log.mockRestore();
    consoleSpy.warn.mockRestore();
    consoleSpy.error.mockRestore();
    process.env.PROVISIONER_DATA_DIR = originalDataDir;
  });

  it('should show debug messages only when verbose', () => {
    new BaseCommand({}).debug('hidden');
    expect(consoleSpy.log).not.toHaveBeenCalled();

    new BaseCommand({ verbose: true }).debug('cache key abc');
    expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] cache key abc');
  });

  it('should hide info but not print or json in quiet mode', () => {
    const cmd = new BaseCommand({ quiet: true });

    cmd.info('hidden');
    cmd.print('line');
    cmd.json({ a: 1 });

    expect(printed(consoleSpy.log)).toEqual(['line', '{\n  "a": 1\n}']);
  });

  it('should always log warnings and errors', () => {
    const cmd = new BaseCommand({ quiet: true });

    cmd.warn('slow mirror');
    cmd.error('missing manifest');

    expect(consoleSpy.warn).toHaveBeenCalledWith('Warning: slow mirror');
    expect(consoleSpy.error).toHaveBeenCalledWith('Error: missing manifest');
  });

  it('should use plain markers without color', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.success('done');
    cmd.fail('broken');

    expect(printed(consoleSpy.log)).toEqual(['[OK] done', '[FAIL] broken']);
  });

  it('should point storage at --data-dir', () => {
    const cmd = createBaseCommand({ dataDir: '/tmp/provisioner-cli' });

    expect(cmd.dataDir).toBe('/tmp/provisioner-cli');
    expect(process.env.PROVISIONER_DATA_DIR).toBe('/tmp/provisioner-cli');
  });

  it('should find the base command stored on the root program', () => {
    const program = new Command();
    const sub = program.command('builds').command('list');
    const base = new BaseCommand({ verbose: true });
    program.setOptionValue('_baseCommand', base);

    expect(getBaseCommand(sub)).toBe(base);
  });

  it('should create a default base command if none is stored', () => {
    const base = getBaseCommand(new Command());

    expect(base).toBeInstanceOf(BaseCommand);
    expect(base.isVerbose()).toBe(false);
  });
});

describe('Exit Codes', () => {
  it('should define standard exit codes', () => {
    expect(EXIT_CODES).toEqual({ SUCCESS: 0, ERROR: 1, USAGE_ERROR: 2, NOT_FOUND: 3 });
  });

  it('should map recipe and config errors to usage errors', () => {
    expect(exitCodeForError(new RecipeError('Recipe not found: provision.json'))).toBe(2);
    expect(exitCodeForError(new ConfigError('Invalid environment variables'))).toBe(2);
    expect(exitCodeForError(new ResolutionError('left-pad', 'No such package'))).toBe(1);
    expect(exitCodeForError(new Error('boom'))).toBe(1);
  });
});

// ============================================================================
// Option Parsers
// ============================================================================

describe('Option Parsers', () => {
  it('should parse stage numbers', () => {
    expect(parseStageNumber('3')).toBe(3);
    expect(parseStageNumber('03')).toBe(3);
    expect(() => parseStageNumber('5')).toThrow(InvalidArgumentError);
    expect(() => parseStageNumber('two')).toThrow('Stage must be a number from 0 to 4.');
  });

  it('should parse profiles', () => {
    expect(parseProfile('development')).toBe('development');
    expect(() => parseProfile('staging')).toThrow('Profile must be one of: production, development.');
  });

  it('should parse formats', () => {
    expect(parseFormat('json')).toBe('json');
    expect(() => parseFormat('yaml')).toThrow('Format must be text or json.');
  });
});

// ============================================================================
// Formatter Tests
// ============================================================================

describe('Formatters', () => {
  it('should format durations', () => {
    expect(formatDuration(850)).toBe('850ms');
    expect(formatDuration(12_340)).toBe('12.3s');
    expect(formatDuration(95_000)).toBe('1m 35s');
  });

  it('should format byte sizes with fewer decimals as they grow', () => {
    expect(formatFileSize(0)).toBe('0 B');
    expect(formatFileSize(500)).toBe('500 B');
    expect(formatFileSize(1536)).toBe('1.50 KB');
    expect(formatFileSize(10240)).toBe('10.0 KB');
    expect(formatFileSize(100 * 1024 * 1024)).toBe('100 MB');
    expect(formatFileSize(2048 * 1024 ** 4)).toBe('2048 TB');
  });

  it('should shorten keys and image IDs', () => {
    expect(shortKey(`sha256:${'0123456789ab'.repeat(5)}abcd`)).toBe('0123456789ab');
  });

  it('should format an error summary', () => {
    expect(formatErrorSummary({ stageId: '02_dependencies', kind: 'manifest', message: 'missing' })).toBe(
      '✘ 02_dependencies [manifest]\n  missing'
    );
    expect(formatErrorSummary({ stageId: '', kind: 'internal', message: 'boom' })).toBe(
      '✘ (before stages) [internal]\n  boom'
    );
  });

  describe('StageProgressDisplay', () => {
    let logSpy: ConsoleSpy;

    beforeEach(() => {
      logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
      logSpy.mockRestore();
    });

    it('should print one line per transition outside a TTY', () => {
      const progress = createStageProgress({ tty: false });

      progress.startStage(0);
      progress.cacheStage(0);
      progress.startStage(1);
      progress.completeStage(1, 850);
      progress.startStage(2);
      progress.failStage(2, 'No such package: left-pad');
      progress.skipRemaining();

      expect(printed(logSpy)).toEqual([
        '[*] 00_base: Base image...',
        '[=] 00_base: Base image (cached)',
        '[*] 01_system_packages: OS packages...',
        '[+] 01_system_packages: OS packages (850ms)',
        '[*] 02_dependencies: Dependencies...',
        '[X] 02_dependencies: Dependencies - No such package: left-pad',
      ]);
      expect(progress.getCounts()).toEqual({
        pending: 0,
        running: 0,
        completed: 1,
        cached: 1,
        failed: 1,
        skipped: 2,
      });
      expect(progress.isSuccess()).toBe(false);
    });
  });
});

// ============================================================================
// Command Handlers
// ============================================================================

describe('Command Handlers', () => {
  let dataDir: string;
  let projectDir: string;
  let base: BaseCommand;
  let logSpy: ConsoleSpy;
  let errorSpy: jest.SpiedFunction<typeof console.error>;
  const originalEnv = {
    dataDir: process.env.PROVISIONER_DATA_DIR,
    profile: process.env.PROVISIONER_PROFILE,
    catalog: process.env.PROVISIONER_CATALOG,
  };

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-data-'));
    projectDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-project-'));
    delete process.env.PROVISIONER_PROFILE;
    delete process.env.PROVISIONER_CATALOG;
    base = new BaseCommand({ quiet: true, dataDir });
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    await createProject(projectDir);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    process.env.PROVISIONER_DATA_DIR = originalEnv.dataDir;
    if (originalEnv.profile !== undefined) process.env.PROVISIONER_PROFILE = originalEnv.profile;
    if (originalEnv.catalog !== undefined) process.env.PROVISIONER_CATALOG = originalEnv.catalog;
    await fs.rm(dataDir, { recursive: true, force: true });
    await fs.rm(projectDir, { recursive: true, force: true });
  });

  describe('build', () => {
    it('should print the build as JSON', async () => {
      const code = await handleBuild(projectDir, { format: 'json' }, base);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(lastJson(logSpy)).toMatchObject({
        success: true,
        dryRun: false,
        imageCreated: true,
        stagesExecuted: ['00_base', '01_system_packages', '02_dependencies', '03_source', '04_runtime_config'],
        stagesCached: [],
        stagesNotRun: [],
        error: null,
      });
    });

    it('should print a one-line summary in quiet mode', async () => {
      await handleBuild(projectDir, {}, base);

      const [line] = printed(logSpy);
      expect(line.startsWith('✔ Build complete (')).toBe(true);
      expect(line.endsWith(') [5 executed, 0 cached]')).toBe(true);
    });

    it('should reuse layers on the second build and honour --no-cache', async () => {
      await handleBuild(projectDir, { format: 'json' }, base);
      await handleBuild(projectDir, { format: 'json' }, base);
      expect(lastJson(logSpy)).toMatchObject({ stagesCached: expect.arrayContaining(['04_runtime_config']) });

      await handleBuild(projectDir, { format: 'json', cache: false }, base);
      expect(lastJson(logSpy)).toMatchObject({ stagesCached: [], imageCreated: false });
    });

    it('should exit 1 when a stage fails', async () => {
      await fs.rm(path.join(projectDir, 'requirements.txt'));

      const code = await handleBuild(projectDir, { format: 'json' }, base);

      expect(code).toBe(EXIT_CODES.ERROR);
      expect(lastJson(logSpy)).toMatchObject({
        success: false,
        imageId: null,
        stagesNotRun: ['02_dependencies', '03_source', '04_runtime_config'],
        error: { stageId: '02_dependencies', kind: 'manifest' },
      });
    });

    it('should throw recipe errors for the runner to map', async () => {
      await expect(handleBuild(path.join(projectDir, 'nope.json'), {}, base)).rejects.toThrow(RecipeError);
    });
  });

  describe('plan', () => {
    it('should report cache status without writing a build', async () => {
      await runBuild({ recipe: projectDir });

      const code = await handlePlan(projectDir, { format: 'json', fromStage: 3 }, base);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      const plan = lastJson(logSpy);
      expect(plan).toMatchObject({ stagesNotRun: [], error: null });
      expect(plan).toHaveProperty(['stages', 2, 'cached'], true);
      expect(plan).toHaveProperty(['stages', 3, 'cached'], false);
    });

    it('should render the plan table', async () => {
      const { result } = await runBuild({ recipe: projectDir, dryRun: true, stopAfterStage: 3 });

      const lines = formatPlan(result).split('\n');

      expect(lines[0]).toBe(`${'STAGE'.padEnd(20)}${'STATUS'.padEnd(9)}${'KEY'.padEnd(14)}INPUTS`);
      expect(lines[1].startsWith(`${'00_base'.padEnd(20)}execute  ${shortKey(result.stages[0].cacheKey)}`)).toBe(true);
      expect(lines[5]).toBe('04_runtime_config   skip');
      expect(formatQuickSummary(result)).toMatch(/^✔ Plan ready \(\d+ms\) \[4 executed, 0 cached\]$/);
    });
  });

  describe('dockerfile', () => {
    it('should write the Dockerfile and .dockerignore', async () => {
      const output = path.join(projectDir, 'out', 'Dockerfile');

      const code = await handleDockerfile(projectDir, { output, ignoreFile: true }, base);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      const dockerfile = await fs.readFile(output, 'utf-8');
      expect(dockerfile.split('\n')[2]).toBe('FROM python:3.8.3-slim-buster AS geo-app');
      expect(await fs.readFile(path.join(projectDir, 'out', '.dockerignore'), 'utf-8')).toBe(
        '**/.git\n**/.provisioner\n**/__pycache__\n**/node_modules\n'
      );
    });
  });

  describe('builds, images and cache', () => {
    let buildId: string;
    let imageId: string;

    beforeEach(async () => {
      const { result } = await runBuild({ recipe: projectDir });
      buildId = result.buildId;
      imageId = result.image?.imageId ?? '';
      logSpy.mockClear();
    });

    it('should list builds as JSON', async () => {
      expect(await handleListBuilds({ format: 'json' }, base)).toBe(EXIT_CODES.SUCCESS);
      expect(lastJson(logSpy)).toMatchObject([{ buildId, status: 'succeeded', imageId }]);
    });

    it('should view the latest build', async () => {
      expect(await handleViewBuild('latest', { format: 'json' }, base)).toBe(EXIT_CODES.SUCCESS);
      expect(lastJson(logSpy)).toMatchObject({ record: { buildId }, manifest: { success: true, imageId } });
    });

    it('should report an unknown build', async () => {
      expect(await handleViewBuild('20200101-000000-none', {}, base)).toBe(EXIT_CODES.NOT_FOUND);
      expect(errorSpy).toHaveBeenCalledWith('Error: Build not found: 20200101-000000-none');
    });

    it('should verify checkpoints and catch tampering', async () => {
      expect(await handleVerifyBuild('latest', base)).toBe(EXIT_CODES.SUCCESS);

      await fs.appendFile(getStageFilePath(buildId, '03_source'), ' ');
      expect(await handleVerifyBuild(buildId, base)).toBe(EXIT_CODES.ERROR);
      expect(errorSpy).toHaveBeenCalledWith(`Error: Build ${buildId} failed verification`);
    });

    it('should list and inspect images', async () => {
      await handleListImages(base);
      expect(printed(logSpy)).toEqual([imageId]);

      expect(await handleInspectImage(imageId, { format: 'json' }, base)).toBe(EXIT_CODES.SUCCESS);
      expect(lastJson(logSpy)).toMatchObject({ imageId, buildId, recipeName: 'geo-app' });

      expect(await handleInspectImage(`sha256:${'0'.repeat(64)}`, {}, base)).toBe(EXIT_CODES.NOT_FOUND);
    });

    it('should list and clear the layer cache', async () => {
      await handleListCache({ format: 'json' }, base);
      expect(lastJson(logSpy)).toHaveLength(5);

      expect(await handleClearCache(base)).toBe(EXIT_CODES.SUCCESS);
      await handleListCache({ format: 'json' }, base);
      expect(lastJson(logSpy)).toEqual([]);
    });

    it('should export the latest build as a ZIP', async () => {
      expect(await handleExport('latest', { zip: true, stages: true }, base)).toBe(EXIT_CODES.SUCCESS);

      const exportsDir = path.join(dataDir, 'builds', buildId, 'exports');
      expect(await fs.readdir(exportsDir)).toContain(`${buildId}_export.zip`);
    });

    it('should refuse to export an unknown build', async () => {
      expect(await handleExport('20200101-000000-none', {}, base)).toBe(EXIT_CODES.NOT_FOUND);
    });
  });
});
