// Shared formatting utilities for the console summary
import { intervalToDuration } from 'date-fns';
import { UNKNOWN_EXTENSION_LABEL, totalCount } from '../../shared/fileExtensions';
import type { ExtensionCounter } from '../../shared/types';

const pad = (value: number) => String(value).padStart(2, '0');

// H:MM:SS, hours not wrapped at a day
export const formatElapsed = (ms: number) => {
  const duration = intervalToDuration({ start: 0, end: Math.max(0, Math.floor(ms / 1000)) * 1000 });
  const hours = (duration.days ?? 0) * 24 + (duration.hours ?? 0);
  return `${hours}:${pad(duration.minutes ?? 0)}:${pad(duration.seconds ?? 0)}`;
};

export const formatStatistics = (counter: ExtensionCounter): string[] => {
  const lines = [`Total: ${totalCount(counter)} files`];
  const extensions = Array.from(counter.keys())
    .filter((ext) => ext !== '')
    .sort();
  for (const ext of extensions) {
    lines.push(` ${ext}: ${counter.get(ext) ?? 0}`);
  }
  const unknown = counter.get('');
  if (unknown !== undefined) {
    lines.push(` ${UNKNOWN_EXTENSION_LABEL}: ${unknown}`);
  }
  return lines;
};
