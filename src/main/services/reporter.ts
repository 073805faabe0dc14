// Reporter - console presentation of crawl progress and results
import { formatElapsed, formatStatistics } from '../utils/formatters';
import { targetLabel, type CrawlSummary, type HostReport, type Target } from '../../shared/types';
import { STOPPED_DIAGNOSTIC } from './cancellation';
import type { WalkProgress } from './directoryWalker';

export interface Reporter {
  start(targetCount: number): void;
  progress(target: Target, progress: WalkProgress): void;
  hostFinished(report: HostReport): void;
  summary(summary: CrawlSummary): void;
}

export const BANNER = String.raw`
  __ _               _ _     _
 / _| |_ _ __       | (_)___| |_ ___ _ __
| |_| __| '_ \ _____| | / __| __/ _ \ '__|
|  _| |_| |_) |_____| | \__ \ ||  __/ |
|_|  \__| .__/      |_|_|___/\__\___|_|
        |_|
`;

const errorNote = (errors: readonly string[]) => (errors.length > 0 ? ` (${errors.length} errors)` : '');

const indent = (errors: readonly string[]) => errors.map((error) => `  ${error}`);

export const describeHost = (report: HostReport): string[] => {
  const label = targetLabel(report.target);
  switch (report.status) {
    case 'failed':
      return [`Error on ${label} server. ${report.failure ?? 'Unknown error'}`];
    case 'stopped': {
      const diagnostics = report.errors.filter((error) => error !== STOPPED_DIAGNOSTIC);
      const found = report.files.length > 0 ? ` ${report.files.length} files found.` : '';
      return [`Stopped working with ${label} server.${found}${errorNote(diagnostics)}`, ...indent(diagnostics)];
    }
    case 'done':
      return [
        `Done with ${label} server. ${report.files.length} files found.${errorNote(report.errors)}`,
        ...indent(report.errors),
      ];
  }
};

export const createConsoleReporter = (verbose: boolean): Reporter => ({
  start(targetCount) {
    console.log(BANNER);
    console.log(`Total number of hosts: ${targetCount}`);
  },
  progress(target, progress) {
    if (!verbose) return;
    console.log(
      `[Walker] Working with ${targetLabel(target)} server. ${progress.pendingDirectories} directory left, ${progress.filesFound} files found.`
    );
  },
  hostFinished(report) {
    const [headline, ...details] = describeHost(report);
    if (report.status === 'failed') {
      console.error(`[Crawl] ${headline}`);
    } else {
      console.log(`[Crawl] ${headline}`);
    }
    details.forEach((line) => console.log(line));
  },
  summary(summary) {
    console.log(`Elapsed time: ${formatElapsed(summary.elapsedMs)}`);
    console.log('SUMMARY STATISTICS');
    formatStatistics(summary.totals).forEach((line) => console.log(line));
  },
});

export const silentReporter: Reporter = {
  start: () => undefined,
  progress: () => undefined,
  hostFinished: () => undefined,
  summary: () => undefined,
};
