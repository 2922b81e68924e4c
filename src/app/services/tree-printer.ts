import { PRINT_INDENT } from '../core/tree-map.config';
import { TreeMap } from '../models/tree-map';
import { walk } from '../models/tree-node';

/**
 * Une ligne par nœud, racine comprise, indentée selon la profondeur.
 * Dossiers : le nom seul. Fichiers : "nom: valeur".
 */
export function formatTree<V>(tree: TreeMap<V>, formatValue: (v: V) => string = String): string[] {
  const lines: string[] = [];
  walk(tree.root, (n, depth) => {
    const label = n.type === 'file' ? `${n.name}: ${formatValue(n.value)}` : n.name;
    lines.push(PRINT_INDENT.repeat(depth) + label);
  });
  return lines;
}

export function printTree<V>(
  tree: TreeMap<V>,
  write: (line: string) => void = line => console.log(line),
  formatValue: (v: V) => string = String,
): void {
  for (const line of formatTree(tree, formatValue)) write(line);
}
