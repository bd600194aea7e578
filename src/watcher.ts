import chokidar, { FSWatcher } from 'chokidar';
import { relative } from 'path';
import { toPosixPath } from './utils/files.js';

export interface WatcherCallbacks {
  /** Called with the project-relative path of every .py file added, changed or removed */
  onPythonFileEvent: (event: 'add' | 'change' | 'unlink', filePath: string) => void | Promise<void>;
}

export interface WatchOptions {
  ignoreDirs?: readonly string[];
  /** Quiet period after the last write before an event fires */
  stabilityThreshold?: number;
}

export function watchProject(
  projectRoot: string,
  callbacks: WatcherCallbacks,
  options: WatchOptions = {}
): FSWatcher {
  console.error(`[Watcher] Creating watcher for: ${projectRoot}`);

  const ignoreDirs = options.ignoreDirs ?? [];

  // Watch the directory itself and filter by extension in the handlers
  const watcher = chokidar.watch(projectRoot, {
    ignored: [
      ...ignoreDirs.map(dir => `**/${dir}/**`),
      '**/.*',  // Hidden files and directories
    ],
    ignoreInitial: true,
    persistent: true,
    followSymlinks: false,
    awaitWriteFinish: {
      stabilityThreshold: options.stabilityThreshold ?? 300,
      pollInterval: 100,
    },
  });

  const forward = (event: 'add' | 'change' | 'unlink') => (absolutePath: string) => {
    if (!absolutePath.endsWith('.py')) return;

    const filePath = toPosixPath(relative(projectRoot, absolutePath));
    console.error(`[Watcher] ${event}: ${filePath}`);

    Promise.resolve(callbacks.onPythonFileEvent(event, filePath)).catch((err: unknown) => {
      console.error(`[Watcher] Handler failed for ${filePath}:`, err instanceof Error ? err.message : err);
    });
  };

  watcher.on('change', forward('change'));
  watcher.on('add', forward('add'));
  watcher.on('unlink', forward('unlink'));

  watcher.on('error', (error: Error) => {
    console.error('[Watcher] Error:', error);
  });

  watcher.on('ready', () => {
    const watched = watcher.getWatched();
    const dirs = Object.keys(watched);
    let fileCount = 0;

    for (const dir of dirs) {
      fileCount += watched[dir].filter(f => f.endsWith('.py')).length;
    }

    console.error(`[Watcher] Ready, watching ${fileCount} Python files in ${dirs.length} directories`);
  });

  return watcher;
}
