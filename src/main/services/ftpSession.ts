// FTP Session - one anonymous basic-ftp connection per target
import * as ftp from 'basic-ftp';
import type { Target } from '../../shared/types';
import { UnsupportedFormatError } from './listingClassifier';

// ============================================================================
// Types and Interfaces
// ============================================================================

export interface FtpSession {
  readonly target: Target;
  changeDirectory(path: string): Promise<void>;
  currentDirectory(): Promise<string>;
  // NLST, without "." and ".."
  listNames(): Promise<string[]>;
  // LIST, one raw line per entry
  listLines(): Promise<string[]>;
  close(): void;
}

export type SessionFactory = (target: Target, timeoutMs: number) => Promise<FtpSession>;

export type DirectoryOutcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'recoverable'; detail: string }
  | { kind: 'fatal'; error: unknown };

const ANONYMOUS_USER = 'anonymous';
const ANONYMOUS_PASSWORD = 'anonymous@';

// ============================================================================
// Error Classification
// ============================================================================

// 421 means the server is closing the control connection
const SERVICE_NOT_AVAILABLE = 421;

// 4xx and 5xx replies refuse one operation (e.g. "450 No files found" for NLST on an
// empty directory); only 421 means the connection itself is gone
export const isPermissionError = (err: unknown): err is ftp.FTPError =>
  err instanceof ftp.FTPError && err.code >= 400 && err.code < 600 && err.code !== SERVICE_NOT_AVAILABLE;

export const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Run one directory's worth of FTP commands and fold the result into an outcome.
 * Permission replies and unparsable listings only cost that directory.
 */
export const runDirectoryOperation = async <T>(operation: () => Promise<T>): Promise<DirectoryOutcome<T>> => {
  try {
    return { kind: 'ok', value: await operation() };
  } catch (err) {
    if (isPermissionError(err) || err instanceof UnsupportedFormatError) {
      return { kind: 'recoverable', detail: errorMessage(err) };
    }
    return { kind: 'fatal', error: err };
  }
};

// ============================================================================
// basic-ftp Session
// ============================================================================

const splitLines = (rawList: string) => rawList.split(/\r?\n/).filter((line) => line.length > 0);

export class BasicFtpSession implements FtpSession {
  constructor(public readonly target: Target, private readonly client: ftp.Client) {}

  async changeDirectory(path: string): Promise<void> {
    await this.client.cd(path === '' ? '.' : path);
  }

  currentDirectory(): Promise<string> {
    return this.client.pwd();
  }

  async listNames(): Promise<string[]> {
    const names = await this.requestRawList('NLST');
    return names.filter((name) => name !== '.' && name !== '..');
  }

  listLines(): Promise<string[]> {
    return this.requestRawList('LIST');
  }

  close(): void {
    this.client.close();
  }

  // basic-ftp only exposes listings through list(); pin the command and keep
  // every line unparsed so the classifier sees exactly what the server sent
  private async requestRawList(command: string): Promise<string[]> {
    this.client.availableListCommands = [command];
    this.client.parseList = (rawList: string) => splitLines(rawList).map((line) => new ftp.FileInfo(line));
    const entries = await this.client.list();
    return entries.map((entry) => entry.name);
  }
}

export const openFtpSession: SessionFactory = async (target, timeoutMs) => {
  const client = new ftp.Client(timeoutMs);
  client.ftp.verbose = false;
  try {
    await client.access({
      host: target.address,
      port: target.port,
      user: ANONYMOUS_USER,
      password: ANONYMOUS_PASSWORD,
      secure: false,
    });
  } catch (err) {
    client.close();
    throw err;
  }
  return new BasicFtpSession(target, client);
};
