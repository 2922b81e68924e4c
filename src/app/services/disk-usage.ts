import { PATH_SEPARATOR } from '../core/tree-map.config';
import { ShapeViolationError } from '../core/shape-violation.error';
import { TreeMap } from '../models/tree-map';
import { DirNode } from '../models/tree-node.model';
import { getValue } from '../models/tree-node';

export interface DiskUsageEntry {
  path: string;     // "" pour la racine
  total: number;
}

/**
 * Rapport façon `du` : chaque dossier sous `path` avec le total de ses feuilles,
 * parcours préfixe (le dossier avant ses sous-dossiers).
 * Sans `path`, part de la racine.
 */
export function diskUsage(tree: TreeMap<number>, path?: string): DiskUsageEntry[] {
  let start: DirNode<number> = tree.root;
  if (path !== undefined) {
    const node = tree.getNode(path);
    if (!node) throw new ShapeViolationError('not-found', path);
    if (node.type !== 'dir') throw new ShapeViolationError('not-a-directory', path);
    start = node;
  }

  const out: DiskUsageEntry[] = [];
  const visit = (dir: DirNode<number>, p: string) => {
    out.push({ path: p, total: getValue(dir) });
    for (const ch of dir.children) {
      if (ch.type === 'dir') visit(ch, p ? `${p}${PATH_SEPARATOR}${ch.name}` : ch.name);
    }
  };
  visit(start, path ?? '');
  return out;
}

/** "total<TAB>chemin", la racine affichée "." */
export function formatDiskUsage(entries: DiskUsageEntry[]): string {
  return entries.map(e => `${e.total}\t${e.path || '.'}`).join('\n');
}
