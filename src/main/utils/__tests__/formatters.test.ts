import { formatElapsed, formatStatistics } from '../formatters';

describe('formatElapsed', () => {
  it('renders hours, minutes and seconds', () => {
    expect(formatElapsed(0)).toBe('0:00:00');
    expect(formatElapsed(65_000)).toBe('0:01:05');
    expect(formatElapsed(3_723_999)).toBe('1:02:03');
  });

  it('does not wrap hours at a day', () => {
    expect(formatElapsed(25 * 60 * 60 * 1000)).toBe('25:00:00');
  });
});

describe('formatStatistics', () => {
  it('sorts extensions and puts extension-less files last', () => {
    const counter = new Map([
      ['.txt', 2],
      ['', 1],
      ['.csv', 3],
    ]);

    expect(formatStatistics(counter)).toEqual(['Total: 6 files', ' .csv: 3', ' .txt: 2', ' Unknown files: 1']);
  });

  it('prints only the total for an empty run', () => {
    expect(formatStatistics(new Map())).toEqual(['Total: 0 files']);
  });
});
