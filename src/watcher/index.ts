/**
 * Watcher Module - Public API
 */

export { FsChangeSource, default } from './fs-change-source.js';
export type { ChangeListener, ChangeSource, FsChangeSourceOptions } from './fs-change-source.js';
