/** Une feuille : un nom et une valeur */
export interface FileNode<V> {
  type: 'file';
  name: string;              // ex: "answer.txt"
  value: V;
}

/** Un dossier : enfants ordonnés (ordre d’insertion), possédés exclusivement */
export interface DirNode<V> {
  type: 'dir';
  name: string;              // ex: "arthur"
  children: TreeNode<V>[];
}

export type TreeNode<V> = DirNode<V> | FileNode<V>;

export function isDirNode<V>(n: TreeNode<V>): n is DirNode<V> {
  return n.type === 'dir';
}

export function isFileNode<V>(n: TreeNode<V>): n is FileNode<V> {
  return n.type === 'file';
}

export function createDir<V>(name: string): DirNode<V> {
  return { type: 'dir', name, children: [] };
}

export function createFile<V>(name: string, value: V): FileNode<V> {
  return { type: 'file', name, value };
}
