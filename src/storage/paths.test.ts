/**
 * Path Resolution Utilities Tests
 *
 * Tests cover environment variable handling, path generation,
 * and ID validation.
 *
 * @module storage/paths.test
 */

import * as os from 'node:os';
import * as path from 'node:path';
import {
  getDataDir,
  getBuildsDir,
  getBuildDir,
  getStageFilePath,
  getLatestBuildSymlink,
  getBuildRecordPath,
  getManifestPath,
  getExportsDir,
  getLayerCacheDir,
  getLayerPath,
  getImagesDir,
  getImagePath,
  getGlobalConfigPath,
} from './paths.js';

describe('storage/paths', () => {
  const originalEnvVar = process.env.PROVISIONER_DATA_DIR;
  const buildId = '20200715-101500-core';
  const digest = 'b'.repeat(64);

  beforeEach(() => {
    process.env.PROVISIONER_DATA_DIR = '/data';
  });

  afterEach(() => {
    if (originalEnvVar === undefined) {
      delete process.env.PROVISIONER_DATA_DIR;
    } else {
      process.env.PROVISIONER_DATA_DIR = originalEnvVar;
    }
  });

  describe('getDataDir', () => {
    it('should return default path when env var is not set', () => {
      delete process.env.PROVISIONER_DATA_DIR;

      expect(getDataDir()).toBe(path.join(os.homedir(), '.provisioner'));
    });

    it('should use PROVISIONER_DATA_DIR when set', () => {
      process.env.PROVISIONER_DATA_DIR = '/custom/data/dir';

      expect(getDataDir()).toBe('/custom/data/dir');
    });

    it('should expand tilde in env var path', () => {
      process.env.PROVISIONER_DATA_DIR = '~/custom/provisioner';

      expect(getDataDir()).toBe(path.join(os.homedir(), 'custom/provisioner'));
    });

    it('should resolve relative paths in env var', () => {
      process.env.PROVISIONER_DATA_DIR = './data';

      expect(getDataDir()).toBe(path.resolve('./data'));
    });

    it('should handle empty env var as not set', () => {
      process.env.PROVISIONER_DATA_DIR = '';

      expect(getDataDir()).toBe(path.join(os.homedir(), '.provisioner'));
    });
  });

  describe('build paths', () => {
    it('should place builds under the data directory', () => {
      expect(getBuildsDir()).toBe('/data/builds');
      expect(getBuildDir(buildId)).toBe(`/data/builds/${buildId}`);
      expect(getLatestBuildSymlink()).toBe('/data/builds/latest');
    });

    it('should place build files inside the build directory', () => {
      expect(getBuildRecordPath(buildId)).toBe(`/data/builds/${buildId}/build.json`);
      expect(getManifestPath(buildId)).toBe(`/data/builds/${buildId}/manifest.json`);
      expect(getExportsDir(buildId)).toBe(`/data/builds/${buildId}/exports`);
    });

    it('should name stage files after the stage ID', () => {
      expect(getStageFilePath(buildId, '02_dependencies')).toBe(
        `/data/builds/${buildId}/02_dependencies.json`
      );
    });

    it('should not double the .json extension', () => {
      expect(getStageFilePath(buildId, '02_dependencies.json')).toBe(
        `/data/builds/${buildId}/02_dependencies.json`
      );
    });

    it('should throw for an empty build ID', () => {
      expect(() => getBuildDir('')).toThrow('buildId is required');
      expect(() => getBuildDir('   ')).toThrow('buildId is required');
    });

    it('should reject path traversal', () => {
      expect(() => getBuildDir('../etc')).toThrow(
        'buildId contains invalid characters (path traversal not allowed)'
      );
      expect(() => getBuildDir('a/b')).toThrow('path traversal not allowed');
      expect(() => getBuildDir('a\\b')).toThrow('path traversal not allowed');
      expect(() => getStageFilePath(buildId, '../00_base')).toThrow(
        'stageId contains invalid characters'
      );
    });
  });

  describe('layer cache and image paths', () => {
    it('should place layers under cache/layers', () => {
      expect(getLayerCacheDir()).toBe('/data/cache/layers');
      expect(getLayerPath(digest)).toBe(`/data/cache/layers/${digest}.json`);
    });

    it('should accept image IDs with or without the sha256 prefix', () => {
      expect(getImagesDir()).toBe('/data/images');
      expect(getImagePath(`sha256:${digest}`)).toBe(`/data/images/${digest}.json`);
      expect(getImagePath(digest)).toBe(`/data/images/${digest}.json`);
    });

    it('should reject an empty image ID', () => {
      expect(() => getImagePath('sha256:')).toThrow('imageId is required');
    });
  });

  describe('getGlobalConfigPath', () => {
    it('should return config.json in the data directory', () => {
      expect(getGlobalConfigPath()).toBe('/data/config.json');
    });
  });
});
