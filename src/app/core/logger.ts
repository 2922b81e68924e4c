import { DEBUG_LOGGING } from './tree-map.config';

export type LogTag = 'tree' | 'workspace' | 'archive';

/** Log de debug, activé par TREE_MAP_DEBUG=1 */
export function debugLog(tag: LogTag, ...args: unknown[]): void {
  if (!DEBUG_LOGGING) return;
  console.log(`[${tag}]`, ...args);
}

export function warnLog(tag: LogTag, ...args: unknown[]): void {
  console.warn(`[${tag}]`, ...args);
}
