/**
 * Shared file extension helpers used by the crawl coordinator and the summary printer
 * This keeps extension detection identical between the statistics and the report
 */

import type { ExtensionCounter } from './types';

// Bucket name printed for files without an extension
export const UNKNOWN_EXTENSION_LABEL = 'Unknown files';

/**
 * Extension of the last path segment, including the dot.
 * Dot-files (".profile") and names ending in a dot ("notes.") have none.
 */
export const fileExtension = (filePath: string): string => {
  const name = filePath.slice(filePath.lastIndexOf('/') + 1);
  const dot = name.lastIndexOf('.');
  if (dot <= 0 || dot === name.length - 1) return '';
  return name.slice(dot);
};

/**
 * Build an extension histogram for one host's files
 */
export const countExtensions = (files: readonly string[]): ExtensionCounter => {
  const counter: ExtensionCounter = new Map();
  for (const file of files) {
    const ext = fileExtension(file);
    counter.set(ext, (counter.get(ext) ?? 0) + 1);
  }
  return counter;
};

/**
 * Fold one histogram into a running total (mutates `total`)
 */
export const mergeExtensionCounts = (total: ExtensionCounter, counts: ExtensionCounter): ExtensionCounter => {
  counts.forEach((count, ext) => {
    total.set(ext, (total.get(ext) ?? 0) + count);
  });
  return total;
};

export const totalCount = (counter: ExtensionCounter): number => {
  let sum = 0;
  counter.forEach((count) => {
    sum += count;
  });
  return sum;
};
