import { TreeMap } from './tree-map';
import { TreeNode } from './tree-node.model';

/** Forme JSON plate d’un nœud (les enfants restent un tableau : l’ordre compte) */
export type SnapshotNode<V> =
  | { type: 'dir'; name: string; children: SnapshotNode<V>[] }
  | { type: 'file'; name: string; value: V };

/** (dé)sérialisation arbre <-> objet JSON */
export function serializeTree<V>(tree: TreeMap<V>): SnapshotNode<V> {
  return serializeNode(tree.root);
}

function serializeNode<V>(n: TreeNode<V>): SnapshotNode<V> {
  if (n.type === 'file') return { type: 'file', name: n.name, value: n.value };
  return { type: 'dir', name: n.name, children: n.children.map(serializeNode) };
}

export function deserializeTree(raw: unknown): TreeMap<unknown>;
export function deserializeTree<V>(raw: unknown, isValue: (v: unknown) => v is V): TreeMap<V>;
export function deserializeTree(raw: unknown, isValue: (v: unknown) => boolean = () => true): TreeMap<unknown> {
  if (!isRecord(raw) || raw['type'] !== 'dir') throw new Error('Snapshot invalide: la racine doit être un dossier');
  const tree = new TreeMap<unknown>();
  tree.root.children = readChildren(raw, 'root', isValue);
  return tree;
}

function readChildren(raw: Record<string, unknown>, where: string, isValue: (v: unknown) => boolean): TreeNode<unknown>[] {
  const children = raw['children'];
  if (!Array.isArray(children)) throw new Error(`Snapshot invalide: enfants manquants sous ${where}`);
  const nodes = children.map((c: unknown) => readNode(c, where, isValue));
  const seen = new Set<string>();
  for (const n of nodes) {
    if (seen.has(n.name)) throw new Error(`Snapshot invalide: nom en double sous ${where}: ${n.name}`);
    seen.add(n.name);
  }
  return nodes;
}

function readNode(raw: unknown, where: string, isValue: (v: unknown) => boolean): TreeNode<unknown> {
  if (!isRecord(raw) || typeof raw['name'] !== 'string') {
    throw new Error(`Snapshot invalide: nœud sans nom sous ${where}`);
  }
  const name = raw['name'];
  const path = `${where}/${name}`;
  switch (raw['type']) {
    case 'dir':
      return { type: 'dir', name, children: readChildren(raw, path, isValue) };
    case 'file':
      if (!('value' in raw) || !isValue(raw['value'])) throw new Error(`Snapshot invalide: valeur refusée pour ${path}`);
      return { type: 'file', name, value: raw['value'] };
    default:
      throw new Error(`Snapshot invalide: type inconnu pour ${path}`);
  }
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}
