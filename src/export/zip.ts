/**
 * Build Archives
 *
 * Packs an export bundle into a ZIP under a `<buildId>/` root, entry for
 * entry from the bundle index, and checks an archive against that index by
 * reading its central directory back.
 *
 * @module export/zip
 */

import * as path from 'node:path';
import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import archiver from 'archiver';
import { LayerIOError } from '../errors/index.js';
import { BUNDLE_INDEX_FILENAME, type BundleResult, type ExportBundleIndex } from './bundler.js';

// ============================================================================
// Types
// ============================================================================

export interface ArchiveOptions {
  /** Compression level (0-9, default 6) */
  compressionLevel?: number;

  /** Defaults to `<buildId>_export.zip` beside the bundle directory */
  zipPath?: string;
}

export interface ArchiveResult {
  zipPath: string;
  sizeBytes: number;
  /** Entry names in archive order, each under `<buildId>/` */
  entries: string[];
}

export interface ArchiveCheck {
  valid: boolean;
  /** Indexed files the archive lacks */
  missing: string[];
  /** Entries the index does not list */
  unexpected: string[];
  /** Archive comment; names the build */
  comment: string;
}

// ============================================================================
// Archive Creation
// ============================================================================

/**
 * Archive entry names for a bundle: the index file, then every file it lists.
 */
export function archiveEntryNames(index: ExportBundleIndex): string[] {
  return [BUNDLE_INDEX_FILENAME, ...index.files.map((file) => file.relativePath)].map(
    (relativePath) => `${index.buildId}/${relativePath}`
  );
}

/**
 * Suggested filename for a build's ZIP export.
 *
 * @example
 * generateZipFilename('20200715-101500-core'); // '20200715-101500-core_export.zip'
 */
export function generateZipFilename(buildId: string): string {
  return `${buildId}_export.zip`;
}

/**
 * Archive a bundle. Only indexed files are packed, so anything written into
 * the bundle directory afterwards stays out.
 *
 * @throws LayerIOError when an indexed file cannot be read or the archive
 *   cannot be written
 *
 * @example
 * ```typescript
 * const bundle = await createExportBundle('latest');
 * const { zipPath } = await archiveBundle(bundle, { compressionLevel: 9 });
 * ```
 */
export async function archiveBundle(bundle: BundleResult, options: ArchiveOptions = {}): Promise<ArchiveResult> {
  const { index, bundlePath } = bundle;
  const zipPath = options.zipPath ?? path.join(path.dirname(bundlePath), generateZipFilename(index.buildId));
  await fsPromises.mkdir(path.dirname(zipPath), { recursive: true });

  const files = [BUNDLE_INDEX_FILENAME, ...index.files.map((file) => file.relativePath)];
  const entries = archiveEntryNames(index);

  await new Promise<void>((resolve, reject) => {
    const output = fs.createWriteStream(zipPath);
    const archive = archiver('zip', {
      zlib: { level: options.compressionLevel ?? 6 },
      comment: `image-provisioner export ${index.buildId}`,
    });

    const fail = (error: Error): void => {
      reject(new LayerIOError(zipPath, `Archive creation failed: ${error.message}`, { cause: error }));
    };

    output.on('close', () => resolve());
    output.on('error', fail);
    // A missing indexed file is a warning to archiver; here it is an error
    archive.on('warning', fail);
    archive.on('error', fail);

    archive.pipe(output);
    files.forEach((relativePath, i) => {
      archive.file(path.join(bundlePath, ...relativePath.split('/')), { name: entries[i] });
    });
    archive.finalize().catch(fail);
  });

  const { size: sizeBytes } = await fsPromises.stat(zipPath);
  return { zipPath, sizeBytes, entries };
}

// ============================================================================
// Archive Verification
// ============================================================================

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const EOCD_MIN_SIZE = 22;
const MAX_COMMENT_SIZE = 0xffff;

/**
 * Entry names and comment from a ZIP's central directory.
 *
 * @throws LayerIOError when the file is not a readable ZIP
 */
export async function readArchiveDirectory(zipPath: string): Promise<{ names: string[]; comment: string }> {
  let buffer: Buffer;
  try {
    buffer = await fsPromises.readFile(zipPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LayerIOError(zipPath, `Cannot read archive ${zipPath}: ${message}`, { cause: error });
  }

  if (buffer.length < EOCD_MIN_SIZE) {
    throw new LayerIOError(zipPath, `Not a ZIP archive: ${zipPath} is too small`);
  }

  // The end-of-central-directory record sits before a comment of at most 64 KiB
  const floor = Math.max(0, buffer.length - EOCD_MIN_SIZE - MAX_COMMENT_SIZE);
  let eocd = -1;
  for (let offset = buffer.length - EOCD_MIN_SIZE; offset >= floor; offset--) {
    if (buffer.readUInt32LE(offset) === EOCD_SIGNATURE) {
      eocd = offset;
      break;
    }
  }
  if (eocd < 0) {
    throw new LayerIOError(zipPath, `Not a ZIP archive: ${zipPath} has no end-of-central-directory record`);
  }

  const entryCount = buffer.readUInt16LE(eocd + 10);
  const directoryOffset = buffer.readUInt32LE(eocd + 16);
  const commentLength = buffer.readUInt16LE(eocd + 20);
  const comment = buffer.toString('utf-8', eocd + 22, eocd + 22 + commentLength);

  const names: string[] = [];
  let offset = directoryOffset;
  for (let i = 0; i < entryCount; i++) {
    if (offset + 46 > buffer.length || buffer.readUInt32LE(offset) !== CENTRAL_HEADER_SIGNATURE) {
      throw new LayerIOError(zipPath, `Corrupt ZIP central directory in ${zipPath} at entry ${i}`);
    }
    const nameLength = buffer.readUInt16LE(offset + 28);
    const extraLength = buffer.readUInt16LE(offset + 30);
    const entryCommentLength = buffer.readUInt16LE(offset + 32);
    names.push(buffer.toString('utf-8', offset + 46, offset + 46 + nameLength));
    offset += 46 + nameLength + extraLength + entryCommentLength;
  }

  return { names, comment };
}

/**
 * Check an archive against the bundle index it was made from. Directory
 * entries are ignored.
 */
export async function verifyArchive(zipPath: string, index: ExportBundleIndex): Promise<ArchiveCheck> {
  const { names, comment } = await readArchiveDirectory(zipPath);
  const files = new Set(names.filter((name) => !name.endsWith('/')));
  const expected = archiveEntryNames(index);
  const expectedSet = new Set(expected);

  const missing = expected.filter((name) => !files.has(name));
  const unexpected = Array.from(files).filter((name) => !expectedSet.has(name));

  return { valid: missing.length === 0 && unexpected.length === 0, missing, unexpected, comment };
}
