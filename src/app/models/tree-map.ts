import { PATH_SEPARATOR, ROOT_NAME } from '../core/tree-map.config';
import { debugLog } from '../core/logger';
import { ShapeViolationError } from '../core/shape-violation.error';
import { DirNode, FileNode, TreeNode, createDir, createFile } from './tree-node.model';
import * as nodes from './tree-node';

/** Élément neutre + addition, requis par valueSum pour une valeur non numérique */
export interface Additive<V> {
  zero: V;
  add(a: V, b: V): V;
}

export const NUMBER_ADDITIVE: Additive<number> = { zero: 0, add: (a, b) => a + b };

/** Feuille aplatie : chemin relatif à la racine (sans "root") */
export interface TreeEntry<V> {
  path: string;
  value: V;
}

/**
 * Arbre adressé par chemins "a/b/c", à la manière d’un système de fichiers.
 * La racine est un dossier nommé "root" qui n’apparaît jamais dans les chemins.
 *
 * Les nœuds renvoyés par les lectures sont ceux de l’arbre : ne pas les garder
 * au-delà de la prochaine mutation.
 */
export class TreeMap<V> {
  readonly root: DirNode<V> = createDir<V>(ROOT_NAME);

  /** ---------- Lecture ---------- **/

  /** `undefined` si un segment manque ; lève si un segment intermédiaire est un fichier */
  getNode(path: string): TreeNode<V> | undefined {
    let cur: TreeNode<V> = this.root;
    for (const part of splitPath(path)) {
      if (cur.type !== 'dir') throw new ShapeViolationError('not-a-directory', path);
      const next: TreeNode<V> | undefined = nodes.getChild(cur, part);
      if (!next) return undefined;
      cur = next;
    }
    return cur;
  }

  getSize(path: string): V {
    const node = this.getNode(path);
    if (!node) throw new ShapeViolationError('not-found', path);
    if (node.type !== 'file') throw new ShapeViolationError('not-a-file', path);
    return node.value;
  }

  getChildren(path: string): readonly TreeNode<V>[] | undefined {
    const node = this.getNode(path);
    return node && node.type === 'dir' ? node.children : undefined;
  }

  /** Total des valeurs sous un chemin (fichier ou dossier) */
  getTotal(this: TreeMap<number>, path: string): number {
    const node = this.getNode(path);
    if (!node) throw new ShapeViolationError('not-found', path);
    return nodes.getValue(node);
  }

  /** Toutes les feuilles avec leur chemin, dans l’ordre du parcours */
  listFiles(): TreeEntry<V>[] {
    const out: TreeEntry<V>[] = [];
    const visit = (dir: DirNode<V>, base: string) => {
      for (const ch of dir.children) {
        const p = base ? `${base}${PATH_SEPARATOR}${ch.name}` : ch.name;
        if (ch.type === 'file') out.push({ path: p, value: ch.value });
        else visit(ch, p);
      }
    };
    visit(this.root, '');
    return out;
  }

  /** ---------- Mutation ---------- **/

  /** Les dossiers intermédiaires doivent exister ; un nom déjà pris est refusé */
  insert(path: string, value: V): FileNode<V> {
    const { dirpath, stem } = splitStem(path);
    return this.appendFile(this.resolveDir(dirpath, path, false), stem, value, path);
  }

  /** Comme insert, en créant les dossiers intermédiaires manquants */
  insertWithParents(path: string, value: V): FileNode<V> {
    const { dirpath, stem } = splitStem(path);
    return this.appendFile(this.resolveDir(dirpath, path, true), stem, value, path);
  }

  /** Trouve ou crée chaque segment comme dossier. Idempotent. */
  makeDirectory(path: string): DirNode<V> {
    return this.resolveDir(splitPath(path), path, true);
  }

  /** Retire tous les enfants nommés comme le dernier segment ; renvoie le nombre retiré */
  remove(path: string): number {
    const { dirpath, stem } = splitStem(path);
    const dir = this.resolveDir(dirpath, path, false);
    const before = dir.children.length;
    dir.children = dir.children.filter(c => c.name !== stem);
    const removed = before - dir.children.length;
    debugLog('tree', `remove ${path}: ${removed}`);
    return removed;
  }

  /** ---------- Agrégation ---------- **/

  valueReduce<T>(seed: T, combine: (acc: T, value: V) => T): T {
    return nodes.valueReduce(this.root, seed, combine);
  }

  reduce<T>(seed: T, combine: (acc: T, name: string, value: V) => T): T {
    return nodes.reduce(this.root, seed, combine);
  }

  valueSum(this: TreeMap<number>): number;
  valueSum(additive: Additive<V>): V;
  valueSum(additive?: Additive<V>): V | number {
    if (additive) return this.valueReduce(additive.zero, (acc, v) => additive.add(acc, v));
    return this.valueReduce(NUMBER_ADDITIVE.zero, (acc, v) => {
      if (typeof v !== 'number') throw new TypeError(`valueSum() sans additif exige des valeurs numériques (${typeof v})`);
      return NUMBER_ADDITIVE.add(acc, v);
    });
  }

  /** Vrai si au moins une feuille satisfait le prédicat. Évalue toutes les feuilles. */
  any(predicate: (name: string, value: V) => boolean): boolean {
    return this.reduce(false, (acc: boolean, name, value) => predicate(name, value) || acc);
  }

  /** ---------- util ---------- **/

  private resolveDir(parts: string[], path: string, createMissing: boolean): DirNode<V> {
    let cur: DirNode<V> = this.root;
    for (const part of parts) {
      let next: TreeNode<V> | undefined = nodes.getMutChild(cur, part);
      if (!next) {
        if (!createMissing) throw new ShapeViolationError('not-found', path);
        next = nodes.makeDirectory(cur, part);
      }
      if (next.type !== 'dir') throw new ShapeViolationError('not-a-directory', path);
      cur = next;
    }
    return cur;
  }

  private appendFile(dir: DirNode<V>, stem: string, value: V, path: string): FileNode<V> {
    if (nodes.getChild(dir, stem)) throw new ShapeViolationError('already-exists', path);
    const f = createFile(stem, value);
    dir.children.push(f);
    debugLog('tree', `insert ${path}`);
    return f;
  }
}

/** Découpe littérale : "a//b/" donne ["a", "", "b", ""] */
export function splitPath(path: string): string[] {
  return path.split(PATH_SEPARATOR);
}

export function splitStem(path: string): { dirpath: string[]; stem: string } {
  const parts = splitPath(path);
  const stem = parts.pop() ?? '';
  return { dirpath: parts, stem };
}
