import { TreeMap } from '../models/tree-map';

/** Petit arbre de démo : deux fichiers sous home/users/arthur, un dossier vide */
export function createDemoTree(): TreeMap<number> {
  const t = new TreeMap<number>();
  t.insertWithParents('home/users/arthur/answer.txt', 42);
  t.insertWithParents('home/users/arthur/password.txt', 128);
  t.makeDirectory('home/users/ford');
  return t;
}

/** Variante plus fournie, pour les rapports du */
export function createDemoDiskTree(): TreeMap<number> {
  const t = createDemoTree();
  t.insertWithParents('var/log/syslog', 1000);
  t.insertWithParents('var/log/auth.log', 250);
  t.insertWithParents('var/cache/apt.bin', 4096);
  t.insert('home/users/ford/guide.md', 7);
  return t;
}
