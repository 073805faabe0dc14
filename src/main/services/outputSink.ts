// Output Sink - where discovered file references are written
import * as fs from 'fs';
import { targetLabel, type Target } from '../../shared/types';

export interface OutputSink {
  // All lines of one host in a single write
  writeLines(lines: readonly string[]): Promise<void>;
  close(): Promise<void>;
}

// Percent-encode everything except unreserved characters and "/"
export const encodePath = (path: string) =>
  path
    .split('/')
    .map((segment) =>
      encodeURIComponent(segment).replace(/[!'()*]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`)
    )
    .join('/');

export const formatFileReference = (target: Target, path: string, encode = false) =>
  `ftp://${targetLabel(target)}${encode ? encodePath(path) : path}`;

export class FileOutputSink implements OutputSink {
  private constructor(private readonly handle: fs.promises.FileHandle) {}

  // Truncates any existing file
  static async open(filePath: string): Promise<FileOutputSink> {
    const handle = await fs.promises.open(filePath, 'w');
    return new FileOutputSink(handle);
  }

  async writeLines(lines: readonly string[]): Promise<void> {
    if (lines.length === 0) return;
    await this.handle.appendFile(lines.map((line) => `${line}\n`).join(''));
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

export class MemoryOutputSink implements OutputSink {
  readonly lines: string[] = [];
  // One entry per writeLines call, to check that hosts never interleave
  readonly bursts: string[][] = [];
  closed = false;

  async writeLines(lines: readonly string[]): Promise<void> {
    if (lines.length === 0) return;
    this.bursts.push([...lines]);
    this.lines.push(...lines);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
