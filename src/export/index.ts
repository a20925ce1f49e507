/**
 * Export Module
 *
 * Exports build artifacts as bundles and ZIP archives.
 *
 * Components:
 * - Bundler: Creates export bundles with configurable content
 * - Zip: Packs a bundle into a ZIP and checks it against the bundle index
 *
 * @module export
 */

export {
  createExportBundle,
  validateBundle,
  BUNDLE_INDEX_FILENAME,
  type ExportOptions,
  type ExportFileCategory,
  type ExportBundleIndex,
  type ExportFileEntry,
  type BundleResult,
} from './bundler.js';

export {
  archiveBundle,
  archiveEntryNames,
  readArchiveDirectory,
  verifyArchive,
  generateZipFilename,
  type ArchiveOptions,
  type ArchiveResult,
  type ArchiveCheck,
} from './zip.js';

import { createExportBundle, type BundleResult, type ExportOptions } from './bundler.js';
import { archiveBundle, verifyArchive, type ArchiveOptions, type ArchiveResult } from './zip.js';
import { LayerIOError } from '../errors/index.js';

/**
 * Creates an export bundle and optionally zips it. The archive is read back
 * and checked against the bundle index before it is reported.
 *
 * @throws LayerIOError when the archive does not hold exactly the indexed files
 *
 * @example
 * ```typescript
 * const { bundle, zipResult } = await exportBuild('latest', { zip: true });
 * ```
 */
export async function exportBuild(
  buildId: string = 'latest',
  options: ExportOptions & { zip?: boolean; zipOptions?: ArchiveOptions } = {}
): Promise<{ bundle: BundleResult; zipResult?: ArchiveResult }> {
  const { zip, zipOptions, ...exportOptions } = options;

  const bundle = await createExportBundle(buildId, exportOptions);

  if (zip) {
    const zipResult = await archiveBundle(bundle, zipOptions);
    const check = await verifyArchive(zipResult.zipPath, bundle.index);
    if (!check.valid) {
      throw new LayerIOError(
        zipResult.zipPath,
        `Archive does not match bundle ${bundle.index.buildId}: missing [${check.missing.join(', ')}], unexpected [${check.unexpected.join(', ')}]`
      );
    }
    return { bundle, zipResult };
  }

  return { bundle };
}
