import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Slide } from '../types';
import { ConfigError } from './errors';
import { createLogger } from './logger';

const log = createLogger('Slides');

const MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
};

/** Last number in the file name (`page_12.jpg` → 12), if any. */
export const pageNumberOf = (fileName: string): number | undefined => {
  const digits = path.parse(fileName).name.match(/\d+/g);
  return digits ? Number(digits[digits.length - 1]) : undefined;
};

export const compareSlideFiles = (a: string, b: string): number => {
  const pageA = pageNumberOf(a);
  const pageB = pageNumberOf(b);
  if (pageA !== undefined && pageB !== undefined && pageA !== pageB) return pageA - pageB;
  if (pageA !== undefined && pageB === undefined) return -1;
  if (pageA === undefined && pageB !== undefined) return 1;
  return a.localeCompare(b);
};

/**
 * Parses a selection such as `3,5-7` into the set of page numbers it names.
 */
export const parseSlideSelection = (selection: string): Set<number> => {
  const pages = new Set<number>();
  for (const token of selection.split(',').map((part) => part.trim()).filter(Boolean)) {
    const range = /^(\d+)\s*-\s*(\d+)$/.exec(token);
    if (range) {
      const start = Number(range[1]);
      const end = Number(range[2]);
      if (start < 1 || end < start) {
        throw new ConfigError([`slide selection: "${token}" is not an ascending page range`]);
      }
      for (let page = start; page <= end; page++) pages.add(page);
      continue;
    }
    if (/^\d+$/.test(token) && Number(token) >= 1) {
      pages.add(Number(token));
      continue;
    }
    throw new ConfigError([`slide selection: "${token}" is not a page number or range`]);
  }
  return pages;
};

/**
 * Reads the page images a rasterizer wrote into `dir`, in page order, with
 * 1-based indices. Pages listed in `excluded` still load but are not analysed.
 */
export const loadSlidesFromDirectory = async (
  dir: string,
  excluded: ReadonlySet<number> = new Set(),
): Promise<Slide[]> => {
  const entries = await readdir(dir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && Object.hasOwn(MIME_TYPES, path.extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort(compareSlideFiles);

  const slides = await Promise.all(
    files.map(async (fileName, position): Promise<Slide> => {
      const index = position + 1;
      const data = await readFile(path.join(dir, fileName));
      return {
        index,
        fileName,
        mimeType: MIME_TYPES[path.extname(fileName).toLowerCase()],
        image: new Uint8Array(data),
        included: !excluded.has(index),
      };
    }),
  );

  log.info(`Loaded ${slides.length} slides from ${dir} (${slides.filter((slide) => !slide.included).length} excluded).`);
  return slides;
};
