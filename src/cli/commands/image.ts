/**
 * Image Commands
 *
 * - image list: stored resulting images
 * - image inspect <imageId>: one image's contents and layers
 *
 * @module cli/commands/image
 */

import type { Command } from 'commander';
import { listImages, loadImage } from '../../image/store.js';
import { formatFileSize } from '../formatters/build-summary.js';
import type { ImageRecord } from '../../schemas/image.js';
import { EXIT_CODES, runHandler, type BaseCommand, type ExitCode } from '../base-command.js';
import { parseFormat, type OutputFormat } from './options.js';

export interface InspectImageOptions {
  format?: OutputFormat;
  /** List every package and file, not just counts */
  full?: boolean;
}

function printMapping(base: BaseCommand, title: string, mapping: Record<string, string>, full: boolean): void {
  const entries = Object.entries(mapping);
  base.section(`${title} (${entries.length})`);
  if (!full && entries.length > 10) {
    base.print(entries.slice(0, 10).map(([name, value]) => `  ${name} ${value}`).join('\n'));
    base.print(`  ... ${entries.length - 10} more (use --full)`);
    return;
  }
  for (const [name, value] of entries) {
    base.print(`  ${name} ${value}`);
  }
}

/**
 * Print an image in text form.
 */
export function printImage(image: ImageRecord, base: BaseCommand, full: boolean): void {
  const { snapshot } = image;

  base.section(`Image ${image.imageId}`);
  base.keyValue('Recipe', image.recipeName);
  base.keyValue('Build', image.buildId);
  base.keyValue('Created', image.createdAt);
  base.keyValue('Size', formatFileSize(image.sizeBytes));
  if (snapshot.base) {
    base.keyValue('Base', `${snapshot.base.identifier} (sha256:${snapshot.base.digest})`);
  }
  base.keyValue('Workdir', snapshot.workdir ?? '/');

  printMapping(base, 'OS packages', snapshot.systemPackages, full);
  printMapping(base, 'Language packages', snapshot.languagePackages, full);
  printMapping(base, 'Environment', snapshot.env, true);

  base.section('Layers');
  for (const layer of snapshot.layers) {
    base.print(
      `  ${layer.stageId.padEnd(20)}${formatFileSize(layer.sizeBytes).padStart(10)}  +${layer.pathsAdded.length} -${layer.pathsPruned.length}`
    );
  }
}

export async function handleInspectImage(
  imageId: string,
  options: InspectImageOptions,
  base: BaseCommand
): Promise<ExitCode> {
  const image = await loadImage(imageId);
  if (!image) {
    base.error(`Image not found: ${imageId}`);
    return EXIT_CODES.NOT_FOUND;
  }

  if (options.format === 'json') {
    base.json(image);
  } else {
    printImage(image, base, options.full === true);
  }
  return EXIT_CODES.SUCCESS;
}

export async function handleListImages(base: BaseCommand): Promise<ExitCode> {
  const imageIds = await listImages();
  if (imageIds.length === 0) {
    base.info('No images stored.');
    return EXIT_CODES.SUCCESS;
  }
  for (const imageId of imageIds) {
    base.print(imageId);
  }
  return EXIT_CODES.SUCCESS;
}

export function registerImageCommands(program: Command): void {
  const image = program.command('image').description('Inspect resulting images');

  image
    .command('list')
    .description('List stored images')
    .action(async (_options: unknown, cmd: Command) => {
      await runHandler(cmd, (base) => handleListImages(base));
    });

  image
    .command('inspect <imageId>')
    .description('Show an image ("sha256:<digest>" or the bare digest)')
    .option('-f, --format <type>', 'Output format: text, json', parseFormat, 'text')
    .option('--full', 'List every package')
    .action(async (imageId: string, options: InspectImageOptions, cmd: Command) => {
      await runHandler(cmd, (base) => handleInspectImage(imageId, options, base));
    });
}
