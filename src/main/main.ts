#!/usr/bin/env node
import { Command } from 'commander';
import { ConfigError, DEFAULT_PORT, DEFAULT_TIMEOUT_SECONDS, parseCrawlOptions } from './config';
import { runCrawl } from './crawl';
import { CancellationFlag } from './services/cancellation';

const cancellation = new CancellationFlag();

// First Ctrl+C lets running sessions stop at their next directory, the second one exits
process.on('SIGINT', () => {
  if (cancellation.isSet) {
    process.exit(130);
  }
  console.log('\nStopping...');
  cancellation.set();
});

async function main() {
  const program = new Command();

  program
    .name('ftp-lister')
    .description('Get the list of files from FTP servers')
    .version('1.0.0')
    .argument('<input>', 'host[:port], host list file or nmap XML report, depending on --mode')
    .argument('<output>', 'path to save the list of files')
    .option('-m, --mode <mode>', 'input type: host, file or nmap', 'host')
    .option('-p, --port <port>', 'default port number', String(DEFAULT_PORT))
    .option('-t, --threads <count>', 'number of concurrent sessions')
    .option('--timeout <seconds>', 'timeout in seconds for FTP operations', String(DEFAULT_TIMEOUT_SECONDS))
    .option('-v, --verbose', 'print progress for every directory', false)
    .option('--encode', 'percent-encode file paths in the output', false)
    .action(async (input: string, output: string, flags: Record<string, unknown>) => {
      const options = parseCrawlOptions({ ...flags, input, output });
      await runCrawl(options, { cancellation });
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('[Error]', error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
});
