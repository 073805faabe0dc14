import { ConfigError, defaultThreadCount, parseCrawlOptions } from '../config';

describe('parseCrawlOptions', () => {
  it('applies defaults and coerces CLI strings', () => {
    const options = parseCrawlOptions({ input: 'ftp.example.org', output: 'files.txt', threads: '8', port: '2121' });

    expect(options).toEqual({
      mode: 'host',
      port: 2121,
      threads: 8,
      timeout: 60,
      verbose: false,
      encode: false,
      input: 'ftp.example.org',
      output: 'files.txt',
    });
  });

  it('picks a default thread count when none is given', () => {
    const options = parseCrawlOptions({ input: 'hosts.txt', output: 'files.txt', mode: 'file' });
    expect(options.threads).toBe(defaultThreadCount());
    expect(options.threads).toBeGreaterThanOrEqual(5);
    expect(options.threads).toBeLessThanOrEqual(32);
  });

  it('lists every invalid option', () => {
    let caught: unknown;
    try {
      parseCrawlOptions({ input: 'h', output: 'o', mode: 'ldap', port: '0', threads: '-1' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues.map((issue) => issue.split(':')[0]) : [];
    expect(issues).toEqual(['mode', 'port', 'threads']);
  });
});
