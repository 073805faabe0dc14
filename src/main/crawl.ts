// Wires configuration, target loading, the output file and the coordinator together
import type { CrawlSummary } from '../shared/types';
import type { CrawlOptions } from './config';
import { CancellationFlag } from './services/cancellation';
import { CrawlCoordinator } from './services/crawlCoordinator';
import type { SessionFactory } from './services/ftpSession';
import { loadTargets } from './services/hostSources';
import { FileOutputSink } from './services/outputSink';
import { createConsoleReporter, type Reporter } from './services/reporter';

export interface CrawlDependencies {
  cancellation: CancellationFlag;
  reporter?: Reporter;
  openSession?: SessionFactory;
}

export const runCrawl = async (options: CrawlOptions, deps: CrawlDependencies): Promise<CrawlSummary> => {
  const targets = await loadTargets(options.mode, options.input, options.port);
  const sink = await FileOutputSink.open(options.output);

  try {
    const coordinator = new CrawlCoordinator({
      threads: options.threads,
      timeoutSeconds: options.timeout,
      sink,
      cancellation: deps.cancellation,
      encodePaths: options.encode,
      reporter: deps.reporter ?? createConsoleReporter(options.verbose),
      openSession: deps.openSession,
    });
    return await coordinator.run(targets);
  } finally {
    await sink.close();
  }
};
