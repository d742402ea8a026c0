/**
 * Plain-text reports printed by the command-line tool.
 */
import type { BannerFile } from './banner-file.js';
import { InvalidArgumentError } from './errors.js';
import type { ExecutableLayout } from './executable-layout.js';
import type { FileTable } from './file-table.js';
import type { DiscHeader } from './types/disc-header.js';
import type { ExecutableSection } from './types/executable-section.js';
import { hex } from './utils/strings.js';

export const SECTION_ORDERS = ['file', 'dol', 'mem'] as const;
/** Header order, file-offset order or memory order. */
export type SectionOrder = (typeof SECTION_ORDERS)[number];

const DEFAULT_LINE_WIDTH = 100;
const COLUMN_PADDING = 3;

export function isSectionOrder(value: string): value is SectionOrder {
  return SECTION_ORDERS.some((order) => order === value);
}

export function formatDiscInfo(header: DiscHeader, files: FileTable): string[] {
  return [
    `Game Code: ${header.gameCode}`,
    `Maker Code: ${header.makerCode}`,
    `Disk Id: ${header.diskId}`,
    `Version: ${header.version}`,
    `Game Name: ${header.gameName}`,
    '',
    `DOL offset: ${hex(header.executableOffset)}`,
    `DOL size: ${hex(header.executableSize)}`,
    `FST offset: ${hex(header.fstOffset)}`,
    `FST size: ${hex(header.fstSize)}`,
    `Max FST size: ${hex(header.maxFstSize)}`,
    `FST entries: ${hex(files.numEntries)}`,
    '',
    `Apploader date: ${header.loader.date}`,
    `Apploader entry point: ${hex(header.loader.entryPoint)}`,
    `Apploader code size: ${hex(header.loader.codeSize)}`,
    `Apploader trailer size: ${hex(header.loader.trailerSize)}`,
  ];
}

/**
 * Lays out directory entries in left-aligned columns.
 *
 * @param options.columns - Entries per row; by default as many as fit in 100 characters
 * @param options.sizes - Append each file's size in bytes
 */
export function formatListing(
  files: FileTable,
  directory: string,
  { columns, sizes = false }: { readonly columns?: number; readonly sizes?: boolean } = {},
): string[] {
  const prefix = directory === '' || directory === '/' || directory.endsWith('/') ? directory : `${directory}/`;
  const cells = Array.from(files.listDirectory(directory), (name) =>
    sizes ? `${name} (${files.get(prefix + name).size})` : name,
  );
  if (cells.length === 0) {
    return [];
  }
  const width = Math.max(...cells.map((cell) => cell.length)) + COLUMN_PADDING;
  const perRow = Math.max(1, columns ?? Math.floor(DEFAULT_LINE_WIDTH / width));

  const lines: string[] = [];
  for (let i = 0; i < cells.length; i += perRow) {
    lines.push(cells.slice(i, i + perRow).map((cell) => cell.padEnd(width)).join('').trimEnd());
  }
  return lines;
}

export function formatBannerInfo(banner: BannerFile): string[] {
  const lines = [`Magic bytes: ${banner.magic}`];
  banner.metadata.forEach((meta, i) => {
    lines.push(
      '',
      `Metadata ${i}:`,
      `Game name: ${meta.gameName}`,
      `Developer name: ${meta.developerName}`,
      `Full game title: ${meta.fullGameTitle}`,
      `Full developer name: ${meta.fullDeveloperName}`,
      `Game description: ${meta.gameDescription}`,
    );
  });
  return lines;
}

function orderedSections(layout: ExecutableLayout, order: SectionOrder): readonly ExecutableSection[] {
  switch (order) {
    case 'file':
      return layout.sections;
    case 'dol':
      return layout.sectionsByFileOffset;
    case 'mem':
      return layout.sectionsByMemAddress;
  }
}

/**
 * Lists the executable's sections. In the two sorted orders, gaps between
 * neighbouring sections are reported in the sorted address space.
 *
 * @throws {InvalidArgumentError} If `order` is not a {@link SectionOrder}
 */
export function formatExecutableInfo(layout: ExecutableLayout, order: string = 'file'): string[] {
  if (!isSectionOrder(order)) {
    throw new InvalidArgumentError(`Unknown section order "${order}", expected one of ${SECTION_ORDERS.join(', ')}`);
  }
  const sections = orderedSections(layout, order);
  const lines = [
    `BSS memory address: ${hex(layout.bssMemAddress)}`,
    `BSS size: ${hex(layout.bssSize)}`,
    `Entry point: ${hex(layout.entryPoint)}`,
    '',
    'Sections:',
  ];
  sections.forEach((section, i) => {
    lines.push(
      `${section.kind} ${section.index} - DOL: ${hex(section.fileOffset).padStart(8)} to ${hex(section.endFileOffset).padStart(8)}, ` +
        `Memory: ${hex(section.memAddress)} to ${hex(section.endMemAddress)} (size: ${hex(section.size)})`,
    );
    const next = sections[i + 1];
    if (next === undefined) {
      return;
    }
    if (order === 'dol' && next.fileOffset > section.endFileOffset) {
      lines.push(`Gap (DOL): ${hex(next.fileOffset - section.endFileOffset)}`);
    }
    if (order === 'mem' && next.memAddress > section.endMemAddress) {
      lines.push(`Gap (memory): ${hex(next.memAddress - section.endMemAddress)}`);
    }
  });
  return lines;
}
