#!/usr/bin/env node
/**
 * gcm - command-line interface for inspecting and patching GameCube disc images.
 */

import { Command, InvalidArgumentError as CommanderArgumentError, Option } from 'commander';
import { readFileSync, writeFileSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import { BannerFile } from './banner-file.js';
import { DiscImage } from './disc-image.js';
import { ExecutableLayout } from './executable-layout.js';
import { SECTION_ORDERS, formatBannerInfo, formatDiscInfo, formatExecutableInfo, formatListing } from './report.js';

const program = new Command();

// Version is set at build time
const version = '0.1.0';

const IMAGE_EXTENSIONS = ['.iso', '.gcm'];

/** Accepts decimal and `0x`-prefixed hexadecimal numbers. */
function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new CommanderArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function isImagePath(filePath: string): boolean {
  return IMAGE_EXTENSIONS.includes(extname(filePath).toLowerCase());
}

function withImage<T>(filePath: string, writable: boolean, action: (image: DiscImage) => T): T {
  const image = DiscImage.open(resolve(filePath), { writable });
  try {
    return action(image);
  } finally {
    image.close();
  }
}

function print(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

function fail(command: string, error: unknown): never {
  console.error(`❌ ${command} failed:`, error instanceof Error ? error.message : String(error));
  process.exit(1);
}

program
  .name('gcm')
  .description('Inspect and patch files inside GameCube disc images')
  .version(version);

program
  .command('isoinfo')
  .description('Show the disc header, FST location and apploader fields')
  .argument('<iso>', 'Disc image')
  .action((iso: string) => {
    try {
      withImage(iso, false, (image) => print(formatDiscInfo(image.header, image.files)));
    } catch (error) {
      fail('isoinfo', error);
    }
  });

program
  .command('ls')
  .description('List the files below a directory inside the image')
  .argument('<iso>', 'Disc image')
  .argument('[dir]', 'Directory inside the image', '/')
  .option('--cols <n>', 'Number of columns', parseNumber)
  .option('--size', 'Show file sizes', false)
  .action((iso: string, dir: string, options: { cols?: number; size: boolean }) => {
    try {
      withImage(iso, false, (image) => print(formatListing(image.files, dir, { columns: options.cols, sizes: options.size })));
    } catch (error) {
      fail('ls', error);
    }
  });

program
  .command('read')
  .description('Copy a file (or part of it) out of the image')
  .argument('<iso>', 'Disc image')
  .argument('<internal-file>', 'Path of the file inside the image')
  .argument('<dst-file>', 'Where to write the data')
  .option('--offset <n>', 'Offset inside the internal file', parseNumber, 0)
  .option('--length <n>', 'Number of bytes; defaults to the rest of the file', parseNumber)
  .action((iso: string, internalFile: string, dstFile: string, options: { offset: number; length?: number }) => {
    try {
      const data = withImage(iso, false, (image) => image.readFile(internalFile, options.offset, options.length));
      writeFileSync(resolve(dstFile), data);
      console.log(`Read ${data.length} bytes from ${internalFile} into ${dstFile}`);
    } catch (error) {
      fail('read', error);
    }
  });

program
  .command('write')
  .description('Overwrite bytes of a file inside the image; the file cannot grow')
  .argument('<iso>', 'Disc image')
  .argument('<internal-file>', 'Path of the file inside the image')
  .argument('<src-file>', 'File holding the data to write')
  .option('--offset <n>', 'Offset inside the internal file', parseNumber, 0)
  .action((iso: string, internalFile: string, srcFile: string, options: { offset: number }) => {
    try {
      const data = readFileSync(resolve(srcFile));
      const written = withImage(iso, true, (image) => image.writeFile(internalFile, options.offset, data));
      console.log(`Wrote ${written} bytes to ${internalFile}`);
    } catch (error) {
      fail('write', error);
    }
  });

program
  .command('bannerinfo')
  .description('Show banner metadata from an image or a .bnr file')
  .argument('<file>', 'Disc image or banner file')
  .argument('[internal-file]', 'Banner path inside the image', 'opening.bnr')
  .action((file: string, internalFile: string) => {
    try {
      const banner = isImagePath(file)
        ? withImage(file, false, (image) => image.getBanner(internalFile))
        : BannerFile.parse(readFileSync(resolve(file)));
      print(formatBannerInfo(banner));
    } catch (error) {
      fail('bannerinfo', error);
    }
  });

program
  .command('dolinfo')
  .description('Show the section table of a DOL executable from an image or a .dol file')
  .argument('<file>', 'Disc image or DOL file')
  .argument('[internal-file]', 'DOL path inside the image', 'start.dol')
  .addOption(new Option('--order <order>', 'Section order: header, DOL offset or memory address').choices(SECTION_ORDERS).default('file'))
  .action((file: string, internalFile: string, options: { order: string }) => {
    try {
      const layout = isImagePath(file)
        ? withImage(file, false, (image) => image.getExecutable(internalFile))
        : ExecutableLayout.parse(readFileSync(resolve(file)));
      print(formatExecutableInfo(layout, options.order));
    } catch (error) {
      fail('dolinfo', error);
    }
  });

program.parse();
