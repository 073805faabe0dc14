// Shared types used by the crawl services and the console presentation

export interface Target {
  readonly address: string;
  readonly port: number;
}

export type EntryClass =
  | { kind: 'directory'; pathSuffix: string }
  | { kind: 'file'; pathSuffix: string }
  | { kind: 'unrecognized'; rawLine: string };

export interface CrawlResult {
  files: string[];
  errors: string[];
}

// Extension (including the leading dot, '' for extension-less names) -> count
export type ExtensionCounter = Map<string, number>;

export type HostStatus = 'done' | 'failed' | 'stopped';

export interface HostReport {
  target: Target;
  status: HostStatus;
  files: string[];
  errors: string[];
  failure?: string;
}

export interface CrawlSummary {
  reports: HostReport[];
  totals: ExtensionCounter;
  totalFiles: number;
  elapsedMs: number;
}

export type InputMode = 'host' | 'file' | 'nmap';

export const targetLabel = (target: Target) => `${target.address}:${target.port}`;
