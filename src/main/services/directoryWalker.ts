// Directory Walker - traverses one target's remote tree over a single session
import { targetLabel, type CrawlResult } from '../../shared/types';
import { CancellationFlag, STOPPED_DIAGNOSTIC } from './cancellation';
import { classifyEntries, splitEntries } from './listingClassifier';
import { isPermissionError, runDirectoryOperation, type FtpSession } from './ftpSession';

export interface WalkProgress {
  pendingDirectories: number;
  filesFound: number;
  path: string;
}

export interface WalkOptions {
  cancellation: CancellationFlag;
  onProgress?: (progress: WalkProgress) => void;
}

// Where traversal starts. Servers that refuse "CWD /" are walked relative to the
// login directory, and paths get their leading slash when they are recorded.
type RootConvention = { kind: 'rooted' } | { kind: 'relative'; homeDirectory: string };

const detectRoot = async (session: FtpSession): Promise<RootConvention> => {
  try {
    await session.changeDirectory('/');
    return { kind: 'rooted' };
  } catch (err) {
    if (!isPermissionError(err)) throw err;
    return { kind: 'relative', homeDirectory: await session.currentDirectory() };
  }
};

const remotePathFor = (root: RootConvention, path: string) => {
  if (root.kind === 'rooted') return path;
  if (path === '') return root.homeDirectory;
  return root.homeDirectory.endsWith('/') ? root.homeDirectory + path : `${root.homeDirectory}/${path}`;
};

const toAbsolute = (path: string) => (path.startsWith('/') ? path : `/${path}`);

/**
 * Walk the whole tree reachable from the root and collect absolute file paths.
 * Subdirectories found in a directory are visited before its queued siblings.
 * Directories the server refuses are recorded in `errors` and skipped; any other
 * failure propagates. The session is closed on every exit path.
 */
export const walkDirectoryTree = async (session: FtpSession, options: WalkOptions): Promise<CrawlResult> => {
  const label = targetLabel(session.target);
  const files: string[] = [];
  const errors: string[] = [];

  try {
    const root = await detectRoot(session);
    const frontier: string[] = [root.kind === 'rooted' ? '/' : ''];

    while (frontier.length > 0) {
      if (options.cancellation.isSet) {
        errors.push(STOPPED_DIAGNOSTIC);
        break;
      }

      const path = frontier[0];
      options.onProgress?.({ pendingDirectories: frontier.length, filesFound: files.length, path });

      const outcome = await runDirectoryOperation(async () => {
        await session.changeDirectory(remotePathFor(root, path));
        const names = await session.listNames();
        const lines = await session.listLines();
        return splitEntries(path, classifyEntries(lines, names));
      });
      frontier.shift();

      if (outcome.kind === 'fatal') {
        throw outcome.error;
      }
      if (outcome.kind === 'recoverable') {
        errors.push(`${label} ${toAbsolute(path)}: ${outcome.detail}`);
        continue;
      }

      files.push(...outcome.value.files.map(toAbsolute));
      frontier.unshift(...outcome.value.directories);
    }
  } finally {
    session.close();
  }

  return { files, errors };
};
