/**
 * Export Bundler Tests
 *
 * Builds the fixture project once, then exports it in different shapes.
 *
 * @module export/bundler.test
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { createExportBundle, validateBundle, BUNDLE_INDEX_FILENAME } from './bundler.js';
import { exportBuild } from './index.js';
import { runBuild } from '../builder/build.js';
import { createProject } from '../../tests/fixtures/project.js';

// ============================================================================
// Test Setup
// ============================================================================

let dataDir: string;
let projectDir: string;
let buildId: string;
const originalDataDir = process.env.PROVISIONER_DATA_DIR;

beforeAll(async () => {
  dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'export-data-'));
  projectDir = await fs.mkdtemp(path.join(os.tmpdir(), 'export-project-'));
  process.env.PROVISIONER_DATA_DIR = dataDir;

  await createProject(projectDir);
  const { result } = await runBuild({ recipe: projectDir });
  buildId = result.buildId;
});

afterAll(async () => {
  process.env.PROVISIONER_DATA_DIR = originalDataDir;
  await fs.rm(dataDir, { recursive: true, force: true });
  await fs.rm(projectDir, { recursive: true, force: true });
});

// ============================================================================
// createExportBundle
// ============================================================================

describe('createExportBundle', () => {
  it('should copy the build record, manifest and image', async () => {
    const bundle = await createExportBundle(buildId);

    expect(bundle.bundlePath.startsWith(path.join(dataDir, 'builds', buildId, 'exports', 'export-'))).toBe(true);
    expect(bundle.index.buildId).toBe(buildId);
    expect(bundle.index.files.map((file) => file.relativePath)).toEqual(['build.json', 'manifest.json', 'image.json']);
    expect(bundle.fileCounts).toEqual({ build: 1, manifest: 1, image: 1 });
    expect(bundle.totalSizeBytes).toBe(bundle.index.files.reduce((sum, file) => sum + file.sizeBytes, 0));

    const image: unknown = JSON.parse(await fs.readFile(path.join(bundle.bundlePath, 'image.json'), 'utf-8'));
    expect(image).toMatchObject({ buildId, recipeName: 'geo-app' });
  });

  it('should write the bundle index', async () => {
    const bundle = await createExportBundle(buildId);

    const index: unknown = JSON.parse(
      await fs.readFile(path.join(bundle.bundlePath, BUNDLE_INDEX_FILENAME), 'utf-8')
    );
    expect(index).toEqual(bundle.index);
  });

  it('should include stage checkpoints in stage order', async () => {
    const bundle = await createExportBundle(buildId, { includeStages: true });

    expect(bundle.index.files.filter((file) => file.category === 'stage').map((file) => file.relativePath)).toEqual([
      'stages/00_base.json',
      'stages/01_system_packages.json',
      'stages/02_dependencies.json',
      'stages/03_source.json',
      'stages/04_runtime_config.json',
    ]);
  });

  it('should render the Dockerfile for the build profile', async () => {
    const bundle = await createExportBundle(buildId, { includeDockerfile: true });

    const dockerfile = await fs.readFile(path.join(bundle.bundlePath, 'Dockerfile'), 'utf-8');
    expect(dockerfile.startsWith('# geo-app: rendered by image-provisioner\n')).toBe(true);
    expect(dockerfile).not.toContain('gettext');
    expect(bundle.fileCounts.dockerfile).toBe(1);
  });

  it('should honour a custom output directory', async () => {
    const outputDir = path.join(dataDir, 'elsewhere');
    const bundle = await createExportBundle(buildId, { outputDir });

    expect(path.dirname(bundle.bundlePath)).toBe(outputDir);
  });

  it('should resolve latest', async () => {
    const bundle = await createExportBundle('latest');
    expect(bundle.index.buildId).toBe(buildId);
  });

  it('should fail for an unknown build', async () => {
    await expect(createExportBundle('20200101-000000-none')).rejects.toThrow('Build not found: 20200101-000000-none');
  });
});

// ============================================================================
// validateBundle
// ============================================================================

describe('validateBundle', () => {
  it('should accept a fresh bundle', async () => {
    const bundle = await createExportBundle(buildId, { includeDockerfile: true });

    expect(await validateBundle(bundle.bundlePath)).toEqual({
      valid: true,
      indexPresent: true,
      missingRequired: [],
      presentFiles: ['build.json', 'manifest.json', 'image.json', 'Dockerfile'],
    });
  });

  it('should report an empty directory', async () => {
    const emptyDir = await fs.mkdtemp(path.join(os.tmpdir(), 'empty-bundle-'));
    try {
      expect(await validateBundle(emptyDir)).toEqual({
        valid: false,
        indexPresent: false,
        missingRequired: ['build.json'],
        presentFiles: [],
      });
    } finally {
      await fs.rm(emptyDir, { recursive: true, force: true });
    }
  });
});

// ============================================================================
// exportBuild
// ============================================================================

describe('exportBuild', () => {
  it('should zip the bundle beside it', async () => {
    const { bundle, zipResult } = await exportBuild(buildId, { zip: true });

    expect(zipResult?.zipPath).toBe(path.join(path.dirname(bundle.bundlePath), `${buildId}_export.zip`));
    expect(zipResult?.entries).toEqual([
      `${buildId}/bundle.json`,
      `${buildId}/build.json`,
      `${buildId}/manifest.json`,
      `${buildId}/image.json`,
    ]);
  });

  it('should skip the archive by default', async () => {
    const { zipResult } = await exportBuild(buildId);
    expect(zipResult).toBeUndefined();
  });
});
