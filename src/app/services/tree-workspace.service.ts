import { Subject } from 'rxjs';
import { debugLog } from '../core/logger';
import { TreeMap } from '../models/tree-map';
import { DirNode, FileNode } from '../models/tree-node.model';
import { SnapshotNode, serializeTree } from '../models/tree-snapshot';

export type TreeChange =
  | { kind: 'insert'; path: string }
  | { kind: 'mkdir'; path: string }
  | { kind: 'remove'; path: string; removed: number }
  | { kind: 'replace' };

/**
 * TreeMap courant + notifications de changement.
 * Un événement n’est émis qu’après une mutation réussie : une violation de forme
 * remonte à l’appelant sans rien émettre.
 */
export class TreeWorkspace<V> {
  private current: TreeMap<V>;

  /** Notif pour ceux qui veulent réagir (affichage, rapport du…) */
  readonly changes$ = new Subject<TreeChange>();

  constructor(tree: TreeMap<V> = new TreeMap<V>()) {
    this.current = tree;
  }

  get tree(): TreeMap<V> {
    return this.current;
  }

  /** Remplace l’arbre entier (ex: après import d’une archive) */
  replace(tree: TreeMap<V>): void {
    this.current = tree;
    this.emit({ kind: 'replace' });
  }

  insert(path: string, value: V): FileNode<V> {
    const f = this.current.insert(path, value);
    this.emit({ kind: 'insert', path });
    return f;
  }

  insertWithParents(path: string, value: V): FileNode<V> {
    const f = this.current.insertWithParents(path, value);
    this.emit({ kind: 'insert', path });
    return f;
  }

  mkdir(path: string): DirNode<V> {
    const d = this.current.makeDirectory(path);
    this.emit({ kind: 'mkdir', path });
    return d;
  }

  remove(path: string): number {
    const removed = this.current.remove(path);
    if (removed > 0) this.emit({ kind: 'remove', path, removed });
    return removed;
  }

  snapshot(): SnapshotNode<V> {
    return serializeTree(this.current);
  }

  /** Termine le flux changes$ */
  dispose(): void {
    this.changes$.complete();
  }

  private emit(change: TreeChange) {
    debugLog('workspace', change);
    this.changes$.next(change);
  }
}
