// Crawl Coordinator - one walker session per target over a bounded pool
import { countExtensions, mergeExtensionCounts } from '../../shared/fileExtensions';
import type { CrawlSummary, ExtensionCounter, HostReport, Target } from '../../shared/types';
import { CancellationFlag, STOPPED_DIAGNOSTIC } from './cancellation';
import { walkDirectoryTree } from './directoryWalker';
import { errorMessage, openFtpSession, type SessionFactory } from './ftpSession';
import { formatFileReference, type OutputSink } from './outputSink';
import { silentReporter, type Reporter } from './reporter';
import { startPool } from './workerPool';

export interface CoordinatorOptions {
  threads: number;
  timeoutSeconds: number;
  sink: OutputSink;
  cancellation: CancellationFlag;
  encodePaths?: boolean;
  reporter?: Reporter;
  openSession?: SessionFactory;
}

export class CrawlCoordinator {
  private readonly reporter: Reporter;
  private readonly openSession: SessionFactory;

  constructor(private readonly options: CoordinatorOptions) {
    this.reporter = options.reporter ?? silentReporter;
    this.openSession = options.openSession ?? openFtpSession;
  }

  async run(targets: readonly Target[]): Promise<CrawlSummary> {
    const startedAt = Date.now();
    const totals: ExtensionCounter = new Map();
    const reports: HostReport[] = [];
    this.reporter.start(targets.length);

    const completions = startPool(targets, {
      concurrency: this.options.threads,
      shouldStart: () => !this.options.cancellation.isSet,
      run: (target) => this.crawlTarget(target),
      skip: (target): HostReport => ({ target, status: 'stopped', files: [], errors: [STOPPED_DIAGNOSTIC] }),
    });

    // Only this loop touches the sink and the totals
    try {
      for await (const report of completions) {
        await this.collect(report, totals);
        reports.push(report);
        this.reporter.hostFinished(report);
      }
    } catch (err) {
      // Running walkers stop at their next directory, queued targets never connect
      this.options.cancellation.set();
      throw err;
    }

    const summary: CrawlSummary = {
      reports,
      totals,
      totalFiles: reports.reduce((sum, report) => sum + report.files.length, 0),
      elapsedMs: Date.now() - startedAt,
    };
    this.reporter.summary(summary);
    return summary;
  }

  private async crawlTarget(target: Target): Promise<HostReport> {
    try {
      const session = await this.openSession(target, this.options.timeoutSeconds * 1000);
      const result = await walkDirectoryTree(session, {
        cancellation: this.options.cancellation,
        onProgress: (progress) => this.reporter.progress(target, progress),
      });
      const stopped = result.errors.includes(STOPPED_DIAGNOSTIC);
      return { target, status: stopped ? 'stopped' : 'done', files: result.files, errors: result.errors };
    } catch (err) {
      const failure = errorMessage(err);
      return { target, status: 'failed', files: [], errors: [failure], failure };
    }
  }

  private async collect(report: HostReport, totals: ExtensionCounter): Promise<void> {
    if (report.status === 'failed') return;
    const encode = this.options.encodePaths ?? false;
    await this.options.sink.writeLines(report.files.map((file) => formatFileReference(report.target, file, encode)));
    mergeExtensionCounts(totals, countExtensions(report.files));
  }
}
