// Listing Classifier - matches NLST names against raw LIST lines
import type { EntryClass } from '../../shared/types';

export class UnsupportedFormatError extends Error {
  constructor(public readonly line: string) {
    super(`Unsupported string format: ${line}`);
    this.name = 'UnsupportedFormatError';
  }
}

type ClassificationRule = {
  kind: 'directory' | 'file';
  matches: (line: string) => boolean;
};

// Checked in order. The second rule also accepts any line without the Windows
// <DIR> marker, so lines in neither Unix nor Windows style end up as files.
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { kind: 'directory', matches: (line) => line.startsWith('d') || line.includes('<DIR>') },
  { kind: 'file', matches: (line) => line.startsWith('-') || !line.includes('<DIR>') },
];

export const classifyLine = (line: string, name: string): EntryClass => {
  const rule = CLASSIFICATION_RULES.find((candidate) => candidate.matches(line));
  if (!rule) {
    return { kind: 'unrecognized', rawLine: line };
  }
  return { kind: rule.kind, pathSuffix: rule.kind === 'directory' ? `${name}/` : name };
};

/**
 * Classify every name returned by NLST using the lines returned by LIST.
 * Each line is consumed by the first name it matches and never reused.
 * Throws UnsupportedFormatError when a name has no line or its line is unrecognized.
 */
export const classifyEntries = (lines: readonly string[], names: readonly string[]): EntryClass[] => {
  const pool = [...lines];
  const classes: EntryClass[] = [];

  for (const name of names) {
    if (name === '.' || name === '..') continue;

    const index = pool.findIndex((line) => line.endsWith(name));
    if (index === -1) {
      throw new UnsupportedFormatError(name);
    }
    const [line] = pool.splice(index, 1);
    const entry = classifyLine(line, name);
    if (entry.kind === 'unrecognized') {
      throw new UnsupportedFormatError(entry.rawLine);
    }
    classes.push(entry);
  }

  return classes;
};

/**
 * Split classified entries into subdirectory paths and file paths under `path`
 */
export const splitEntries = (path: string, entries: readonly EntryClass[]) => {
  const directories: string[] = [];
  const files: string[] = [];
  for (const entry of entries) {
    if (entry.kind === 'directory') {
      directories.push(path + entry.pathSuffix);
    } else if (entry.kind === 'file') {
      files.push(path + entry.pathSuffix);
    }
  }
  return { directories, files };
};
