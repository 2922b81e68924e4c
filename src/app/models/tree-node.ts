import { ShapeViolationError } from '../core/shape-violation.error';
import { DirNode, TreeNode, createDir } from './tree-node.model';

/** ---------- Accès par nom ---------- **/

export function getName<V>(node: TreeNode<V>): string {
  return node.name;
}

/** Premier enfant portant exactement ce nom ; rien pour un fichier. Recherche linéaire. */
export function getChild<V>(node: TreeNode<V>, name: string): TreeNode<V> | undefined {
  if (node.type !== 'dir') return undefined;
  return node.children.find(c => c.name === name);
}

/** Même recherche que getChild, pour les parcours qui modifient l’arbre */
export function getMutChild<V>(node: TreeNode<V>, name: string): TreeNode<V> | undefined {
  return getChild(node, name);
}

/**
 * Ajoute un dossier vide en fin de liste et le renvoie.
 * Pas de contrôle de doublon ici : c’est le rôle des opérations par chemin.
 */
export function makeDirectory<V>(node: TreeNode<V>, name: string): DirNode<V> {
  if (node.type !== 'dir') throw new ShapeViolationError('not-a-directory', node.name);
  const dir = createDir<V>(name);
  node.children.push(dir);
  return dir;
}

/** ---------- Agrégation ---------- **/

/**
 * Pli sur les valeurs des fichiers du sous-arbre.
 * Parcours en profondeur, préfixe, enfants dans l’ordre d’insertion ;
 * les dossiers sont transparents.
 */
export function valueReduce<V, T>(node: TreeNode<V>, seed: T, combine: (acc: T, value: V) => T): T {
  return reduce(node, seed, (acc, _name, value) => combine(acc, value));
}

/** Comme valueReduce, mais `combine` reçoit aussi le nom de la feuille */
export function reduce<V, T>(
  node: TreeNode<V>,
  seed: T,
  combine: (acc: T, name: string, value: V) => T,
): T {
  if (node.type === 'file') return combine(seed, node.name, node.value);
  let acc = seed;
  for (const ch of node.children) acc = reduce(ch, acc, combine);
  return acc;
}

/** Taille d’un fichier, ou total du sous-arbre pour un dossier */
export function getValue(node: TreeNode<number>): number {
  if (node.type === 'file') return node.value;
  return node.children.reduce((sum, ch) => sum + getValue(ch), 0);
}

/** Visite chaque nœud (dossiers compris) avec sa profondeur, racine à 0 */
export function walk<V>(node: TreeNode<V>, cb: (n: TreeNode<V>, depth: number) => void, depth = 0): void {
  cb(node, depth);
  if (node.type === 'dir') {
    for (const ch of node.children) walk(ch, cb, depth + 1);
  }
}
