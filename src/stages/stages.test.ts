/**
 * Tests for the five provisioning stages
 *
 * Each stage is driven directly through prepare/apply against the
 * catalog-backed resolvers, without the executor.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import {
  baseStage,
  systemPackagesStage,
  dependenciesStage,
  sourceStage,
  runtimeConfigStage,
  createProvisioningStages,
  isPackageCachePath,
} from './index.js';
import { parseCatalog, createCatalogResolvers } from '../resolver/index.js';
import { RecipeSchema, type RecipeInput } from '../schemas/recipe.js';
import type { ImageSnapshot } from '../schemas/image.js';
import type { Logger, StageContext } from '../pipeline/types.js';
import { emptySnapshot, freezeSnapshot } from '../image/snapshot.js';
import { digestOf, sha256Hex } from '../image/digest.js';
import { ManifestError, RecipeError, ResolutionError } from '../errors/index.js';

const BASE_DIGEST = 'a'.repeat(64);
const SITE_PACKAGES = '/usr/local/lib/python3.8/site-packages';

const catalog = parseCatalog({
  baseImages: {
    'python:3.8.3-slim-buster': {
      digest: BASE_DIGEST,
      distribution: 'debian',
      release: 'buster',
      sizeBytes: 1000,
      languagePackageRoot: SITE_PACKAGES,
      systemPackages: { libc6: '2.28-10' },
      languagePackages: { pip: '20.1.1' },
      env: { PATH: '/usr/local/bin:/usr/bin:/bin', LANG: 'C.UTF-8' },
    },
  },
  systemPackages: {
    libc6: { version: '2.28-10', sizeBytes: 500 },
    binutils: { version: '2.31.1-16', sizeBytes: 100, depends: ['libc6'] },
    locales: { version: '2.28-10', sizeBytes: 50 },
    gettext: { version: '0.19.8.1-9', sizeBytes: 60 },
    tzdata: { version: '2020a-0+deb10u1', sizeBytes: 30, prompts: true },
  },
  languagePackages: {
    Django: {
      versions: { '3.0.7': { requires: ['asgiref~=3.2', 'pytz', 'sqlparse>=0.2.2'], sizeBytes: 300 } },
    },
    asgiref: { versions: { '3.2.10': { sizeBytes: 11 } } },
    pytz: { versions: { '2020.1': { sizeBytes: 20 } } },
    sqlparse: { versions: { '0.3.1': { sizeBytes: 5 } } },
    psycopg2: { versions: { '2.8.5': { sizeBytes: 50 } } },
  },
});

const createLogger = () => ({
  debug: jest.fn<Logger['debug']>(),
  info: jest.fn<Logger['info']>(),
  warn: jest.fn<Logger['warn']>(),
  error: jest.fn<Logger['error']>(),
});

describe('provisioning stages', () => {
  let projectDir: string;

  beforeEach(async () => {
    projectDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stages-test-'));
  });

  afterEach(async () => {
    await fs.rm(projectDir, { recursive: true, force: true });
  });

  const createContext = (recipe: Partial<RecipeInput> = {}, overrides: Partial<StageContext> = {}): StageContext => ({
    buildId: '20200715-101500-core',
    recipe: RecipeSchema.parse({
      name: 'core',
      base: 'python:3.8.3-slim-buster',
      dependencies: { manifest: 'requirements.txt' },
      source: { root: '.', workdir: '/code' },
      ...recipe,
    }),
    recipeDir: projectDir,
    resolvers: createCatalogResolvers(catalog),
    profile: 'production',
    unattended: true,
    ...overrides,
  });

  const baseSnapshot = async (): Promise<ImageSnapshot> => {
    const prepared = await baseStage.prepare(createContext());
    const { snapshot } = await prepared.apply(freezeSnapshot(emptySnapshot()));
    return freezeSnapshot(snapshot);
  };

  // ==========================================================================
  // Stage 00
  // ==========================================================================

  describe('baseStage', () => {
    it('declares the identifier and the catalog digest', async () => {
      const prepared = await baseStage.prepare(createContext());
      expect(prepared.inputs).toEqual({
        identifier: 'python:3.8.3-slim-buster',
        catalogDigest: digestOf(catalog),
      });
    });

    it('starts from the registry entry for the identifier', async () => {
      const prepared = await baseStage.prepare(createContext());
      const { snapshot, layer } = await prepared.apply(freezeSnapshot(emptySnapshot()));

      expect(snapshot.base).toEqual({
        identifier: 'python:3.8.3-slim-buster',
        repository: 'python',
        version: '3.8.3',
        variant: 'slim-buster',
        distribution: 'debian',
        release: 'buster',
        digest: BASE_DIGEST,
        languagePackageRoot: SITE_PACKAGES,
      });
      expect(snapshot.systemPackages).toEqual({ libc6: '2.28-10' });
      expect(snapshot.languagePackages).toEqual({ pip: '20.1.1' });
      expect(Object.keys(snapshot.env)).toEqual(['LANG', 'PATH']);
      expect(layer).toEqual({ sizeBytes: 1000, pathsAdded: ['/'], pathsPruned: [] });
    });

    it('accepts a matching digest pin', async () => {
      const prepared = await baseStage.prepare(
        createContext({ base: `python:3.8.3-slim-buster@sha256:${BASE_DIGEST}` })
      );
      const { snapshot } = await prepared.apply(emptySnapshot());
      expect(snapshot.base?.digest).toBe(BASE_DIGEST);
    });

    it('rejects a digest pin the registry does not have', async () => {
      const prepared = await baseStage.prepare(
        createContext({ base: `python:3.8.3-slim-buster@sha256:${'b'.repeat(64)}` })
      );
      await expect(prepared.apply(emptySnapshot())).rejects.toBeInstanceOf(ResolutionError);
    });

    it('rejects an unknown base', async () => {
      const prepared = await baseStage.prepare(createContext({ base: 'python:3.9.0-slim-buster' }));
      await expect(prepared.apply(emptySnapshot())).rejects.toThrow(
        'Base image not found: python:3.9.0-slim-buster'
      );
    });
  });

  // ==========================================================================
  // Stage 01
  // ==========================================================================

  describe('systemPackagesStage', () => {
    it('normalises the package list into its inputs', async () => {
      const logger = createLogger();
      const prepared = await systemPackagesStage.prepare(
        createContext(
          {
            systemPackages: {
              packages: ['locales', 'binutils', 'locales', { name: 'gettext', development: true }],
            },
          },
          { logger }
        )
      );

      expect(prepared.inputs).toEqual({
        packages: ['binutils', 'locales'],
        frontend: 'noninteractive',
        installRecommends: false,
      });
      expect(logger.info).toHaveBeenCalledWith('Leaving out development-only packages under production: gettext');
    });

    it('includes development-only packages under the development profile', async () => {
      const prepared = await systemPackagesStage.prepare(
        createContext(
          { systemPackages: { packages: ['binutils', { name: 'gettext', development: true }] } },
          { profile: 'development' }
        )
      );
      expect(prepared.inputs.packages).toEqual(['binutils', 'gettext']);
    });

    it('produces the same inputs whatever order packages are listed in', async () => {
      const a = await systemPackagesStage.prepare(
        createContext({ systemPackages: { packages: ['locales', 'binutils'] } })
      );
      const b = await systemPackagesStage.prepare(
        createContext({ systemPackages: { packages: ['binutils', 'locales', 'binutils'] } })
      );
      expect(a.inputs).toEqual(b.inputs);
    });

    it('installs packages and dependencies, pruning the package cache', async () => {
      const prepared = await systemPackagesStage.prepare(
        createContext({ systemPackages: { packages: ['locales', 'binutils'] } })
      );
      const { snapshot, layer } = await prepared.apply(await baseSnapshot());

      expect(snapshot.systemPackages).toEqual({
        binutils: '2.31.1-16',
        libc6: '2.28-10',
        locales: '2.28-10',
      });
      expect(layer).toEqual({
        sizeBytes: 150,
        pathsAdded: ['/var/lib/dpkg/info/binutils.list', '/var/lib/dpkg/info/locales.list'],
        pathsPruned: [
          '/var/lib/apt/lists/deb.debian.org_debian_dists_buster_InRelease',
          '/var/lib/apt/lists/deb.debian.org_debian_dists_buster_main_Packages',
          '/var/cache/apt/archives/binutils_2.31.1-16.deb',
          '/var/cache/apt/archives/locales_2.28-10.deb',
        ],
      });
      expect(layer.pathsPruned.every(isPackageCachePath)).toBe(true);
      expect(layer.pathsAdded.some(isPackageCachePath)).toBe(false);
    });

    it('leaves the snapshot unchanged for an empty list', async () => {
      const input = await baseSnapshot();
      const prepared = await systemPackagesStage.prepare(createContext());
      const { snapshot, layer } = await prepared.apply(input);

      expect(snapshot).toBe(input);
      expect(layer).toEqual({ sizeBytes: 0, pathsAdded: [], pathsPruned: [] });
    });

    it('forces the noninteractive frontend in unattended builds', async () => {
      const prepared = await systemPackagesStage.prepare(
        createContext({ frontend: 'readline', systemPackages: { packages: ['tzdata'] } })
      );
      expect(prepared.inputs.frontend).toBe('noninteractive');

      const { snapshot } = await prepared.apply(await baseSnapshot());
      expect(snapshot.systemPackages.tzdata).toBe('2020a-0+deb10u1');
    });

    it('fails on a prompting package when the frontend is interactive', async () => {
      const prepared = await systemPackagesStage.prepare(
        createContext({ frontend: 'readline', systemPackages: { packages: ['tzdata'] } }, { unattended: false })
      );
      expect(prepared.inputs.frontend).toBe('readline');
      await expect(prepared.apply(await baseSnapshot())).rejects.toBeInstanceOf(RecipeError);
    });

    it('needs a base image', async () => {
      const prepared = await systemPackagesStage.prepare(
        createContext({ systemPackages: { packages: ['locales'] } })
      );
      await expect(prepared.apply(emptySnapshot())).rejects.toThrow(
        'OS packages cannot be installed before a base image is selected'
      );
    });
  });

  // ==========================================================================
  // Stage 02
  // ==========================================================================

  describe('dependenciesStage', () => {
    const manifest = 'Django==3.0.7\npsycopg2==2.8.5\n';

    beforeEach(async () => {
      await fs.writeFile(path.join(projectDir, 'requirements.txt'), manifest);
    });

    it('declares the hash of the manifest bytes', async () => {
      const prepared = await dependenciesStage.prepare(createContext());
      expect(prepared.inputs).toEqual({ manifestSha256: sha256Hex(manifest) });
    });

    it('installs the resolved set into the language package root', async () => {
      const prepared = await dependenciesStage.prepare(createContext());
      const { snapshot, layer } = await prepared.apply(await baseSnapshot());

      expect(snapshot.languagePackages).toEqual({
        asgiref: '3.2.10',
        django: '3.0.7',
        pip: '20.1.1',
        psycopg2: '2.8.5',
        pytz: '2020.1',
        sqlparse: '0.3.1',
      });
      expect(layer.sizeBytes).toBe(386);
      expect(layer.pathsAdded).toEqual([
        `${SITE_PACKAGES}/asgiref-3.2.10.dist-info`,
        `${SITE_PACKAGES}/django-3.0.7.dist-info`,
        `${SITE_PACKAGES}/psycopg2-2.8.5.dist-info`,
        `${SITE_PACKAGES}/pytz-2020.1.dist-info`,
        `${SITE_PACKAGES}/sqlparse-0.3.1.dist-info`,
      ]);
    });

    it('fails in prepare when the manifest is missing', async () => {
      await fs.rm(path.join(projectDir, 'requirements.txt'));

      const pending = dependenciesStage.prepare(createContext());
      await expect(pending).rejects.toBeInstanceOf(ManifestError);
      await expect(pending).rejects.toThrow(
        `Dependency manifest not found: ${path.join(projectDir, 'requirements.txt')}`
      );
    });

    it('reports unknown packages as resolution failures', async () => {
      await fs.writeFile(path.join(projectDir, 'requirements.txt'), 'left-pad==1.0\n');

      const prepared = await dependenciesStage.prepare(createContext());
      await expect(prepared.apply(await baseSnapshot())).rejects.toBeInstanceOf(ResolutionError);
    });
  });

  // ==========================================================================
  // Stage 03
  // ==========================================================================

  describe('sourceStage', () => {
    beforeEach(async () => {
      await fs.mkdir(path.join(projectDir, 'app'));
      await fs.mkdir(path.join(projectDir, '.git'));
      await fs.mkdir(path.join(projectDir, '__pycache__'));
      await fs.writeFile(path.join(projectDir, 'manage.py'), 'import app\n');
      await fs.writeFile(path.join(projectDir, 'app', 'models.py'), 'MODELS = []\n');
      await fs.writeFile(path.join(projectDir, '.git', 'HEAD'), 'ref: refs/heads/main\n');
      await fs.writeFile(path.join(projectDir, '__pycache__', 'app.pyc'), 'compiled');
    });

    it('declares the workdir and a hash per file, skipping ignored entries', async () => {
      const prepared = await sourceStage.prepare(createContext());

      expect(prepared.inputs).toEqual({
        workdir: '/code',
        files: {
          'app/models.py': sha256Hex('MODELS = []\n'),
          'manage.py': sha256Hex('import app\n'),
        },
      });
    });

    it('layers the tree under the working directory', async () => {
      const prepared = await sourceStage.prepare(createContext());
      const { snapshot, layer } = await prepared.apply(await baseSnapshot());

      expect(snapshot.workdir).toBe('/code');
      expect(snapshot.files).toEqual({
        '/code/app/models.py': { sha256: sha256Hex('MODELS = []\n'), sizeBytes: 12 },
        '/code/manage.py': { sha256: sha256Hex('import app\n'), sizeBytes: 11 },
      });
      expect(layer).toEqual({
        sizeBytes: 23,
        pathsAdded: ['/code/app/models.py', '/code/manage.py'],
        pathsPruned: [],
      });
    });

    it('changes its inputs when a file changes', async () => {
      const before = await sourceStage.prepare(createContext());
      await fs.writeFile(path.join(projectDir, 'app', 'models.py'), 'MODELS = ["site"]\n');
      const after = await sourceStage.prepare(createContext());

      expect(after.inputs).not.toEqual(before.inputs);
    });

    it('honours a custom ignore list', async () => {
      const prepared = await sourceStage.prepare(
        createContext({ source: { root: '.', workdir: '/srv', ignore: ['app'] } })
      );
      expect(prepared.inputs.files).toEqual({
        '.git/HEAD': sha256Hex('ref: refs/heads/main\n'),
        '__pycache__/app.pyc': sha256Hex('compiled'),
        'manage.py': sha256Hex('import app\n'),
      });
    });
  });

  // ==========================================================================
  // Stage 04
  // ==========================================================================

  describe('runtimeConfigStage', () => {
    it('keeps the last assignment of a repeated name', async () => {
      const prepared = await runtimeConfigStage.prepare(
        createContext({
          env: [
            { name: 'DEBUG', value: '1' },
            { name: 'PYTHONUNBUFFERED', value: '1' },
            { name: 'DEBUG', value: '0' },
          ],
        })
      );
      expect(prepared.inputs).toEqual({ env: { DEBUG: '0', PYTHONUNBUFFERED: '1' } });
    });

    it('merges over the base environment', async () => {
      const prepared = await runtimeConfigStage.prepare(createContext({ env: { LANG: 'en_US.UTF-8' } }));
      const { snapshot, layer } = await prepared.apply(await baseSnapshot());

      expect(snapshot.env).toEqual({ LANG: 'en_US.UTF-8', PATH: '/usr/local/bin:/usr/bin:/bin' });
      expect(layer).toEqual({ sizeBytes: 0, pathsAdded: [], pathsPruned: [] });
    });

    it('never exposes build arguments', async () => {
      const prepared = await runtimeConfigStage.prepare(
        createContext({ buildArgs: { PIP_INDEX: 'mirror' }, env: { APP_ENV: 'prod' } })
      );
      const { snapshot } = await prepared.apply(await baseSnapshot());

      expect(snapshot.env.PIP_INDEX).toBeUndefined();
      expect(snapshot.env.APP_ENV).toBe('prod');
    });
  });

  describe('createProvisioningStages', () => {
    it('returns the five stages in order', () => {
      expect(createProvisioningStages().map((stage) => stage.id)).toEqual([
        '00_base',
        '01_system_packages',
        '02_dependencies',
        '03_source',
        '04_runtime_config',
      ]);
    });
  });
});
