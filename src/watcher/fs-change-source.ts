/**
 * Change sources: where "this path changed" notifications come from.
 */

import * as fs from 'fs';
import * as path from 'path';
import pino from 'pino';
import { errorMessage } from '../shared/errors.js';
import type { ChangeKind, ChangeNotification } from '../shared/types.js';

const logger = pino({ name: 'leakguard:watcher', level: process.env['LOG_LEVEL'] ?? 'info' });

export type ChangeListener = (notification: ChangeNotification) => void;

export interface ChangeSource {
  start(listener: ChangeListener): void;
  close(): void;
}

export interface FsChangeSourceOptions {
  /** Directory names whose events are ignored. */
  ignoredDirectories?: readonly string[];
  onError?: (root: string, error: Error) => void;
}

/**
 * Recursive `fs.watch` over each root. A rename event is reported as
 * 'created' when the path exists afterwards and 'deleted' when it does not.
 */
export class FsChangeSource implements ChangeSource {
  private readonly roots: string[];
  private readonly ignored: ReadonlySet<string>;
  private readonly onError: ((root: string, error: Error) => void) | undefined;
  private watchers: fs.FSWatcher[] = [];

  constructor(roots: readonly string[], options: FsChangeSourceOptions = {}) {
    this.roots = roots.map(r => path.resolve(r));
    this.ignored = new Set(options.ignoredDirectories ?? []);
    this.onError = options.onError;
  }

  start(listener: ChangeListener): void {
    if (this.watchers.length > 0) {
      logger.warn('Change source already started');
      return;
    }

    for (const root of this.roots) {
      if (!fs.existsSync(root)) {
        logger.warn({ root }, 'Path does not exist, not watching');
        continue;
      }

      const watcher = fs.watch(root, { recursive: true }, (eventType, filename) => {
        if (!filename) return;

        const segments = filename.split(/[\\/]/);
        if (segments.some(s => this.ignored.has(s))) return;

        const absolutePath = path.join(root, filename);
        const kind: ChangeKind =
          eventType === 'rename' ? (fs.existsSync(absolutePath) ? 'created' : 'deleted') : 'changed';

        listener({ path: absolutePath, kind, timestamp: Date.now() });
      });

      watcher.on('error', (error: Error) => {
        logger.error({ root, error: errorMessage(error) }, 'Watcher error');
        this.onError?.(root, error);
      });

      this.watchers.push(watcher);
      logger.info({ root }, 'Watching');
    }
  }

  close(): void {
    for (const watcher of this.watchers) {
      watcher.close();
    }
    this.watchers = [];
  }

  get isWatching(): boolean {
    return this.watchers.length > 0;
  }
}

export default FsChangeSource;
