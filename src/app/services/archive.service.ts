import JSZip from 'jszip';
import { debugLog, warnLog } from '../core/logger';
import { PATH_SEPARATOR } from '../core/tree-map.config';
import { isShapeViolation } from '../core/shape-violation.error';
import { TreeMap } from '../models/tree-map';
import { DirNode } from '../models/tree-node.model';

export type ArchiveData = Uint8Array | ArrayBuffer;

export interface ArchiveImportOptions {
  /** Retire le dossier commun à toutes les entrées (ex: "projet/" d’un zip de dossier) */
  stripCommonPrefix?: boolean;
}

/** Import / export d’un TreeMap depuis ou vers une archive zip, en mémoire */
export class ArchiveService {

  /** Tailles décompressées en octets : de quoi produire un rapport `du` */
  importSizes(data: ArchiveData, options: ArchiveImportOptions = {}): Promise<TreeMap<number>> {
    return this.importArchive(data, bytes => bytes.length, options);
  }

  async importArchive<V>(
    data: ArchiveData,
    toValue: (bytes: Uint8Array, path: string) => V,
    options: ArchiveImportOptions = {},
  ): Promise<TreeMap<V>> {
    const zip = await JSZip.loadAsync(data);

    // 1) Toutes les entrées, dossiers compris (un dossier vide n’existe que par son entrée)
    const entries = Object.values(zip.files);
    const cleaned = entries.map(e => cleanEntryName(e.name));

    // 2) Préfixe commun éventuel
    const prefix = options.stripCommonPrefix === false ? '' : commonDirPrefix(cleaned);
    debugLog('archive', `${entries.length} entrées, préfixe "${prefix}"`);

    // 3) Dossiers et fichiers, dans l’ordre de l’archive ; intermédiaires créés à la volée
    const tree = new TreeMap<V>();
    for (let i = 0; i < entries.length; i++) {
      const e = entries[i];
      const stripped = prefix ? cleaned[i].slice(prefix.length + 1) : cleaned[i];
      const path = e.dir ? stripped.replace(/\/+$/, '') : stripped;
      if (!path) continue;
      try {
        if (e.dir) tree.makeDirectory(path);
        else tree.insertWithParents(path, toValue(await e.async('uint8array'), path));
      } catch (err) {
        if (!isShapeViolation(err)) throw err;
        warnLog('archive', `entrée ignorée: ${err.message}`);
      }
    }
    return tree;
  }

  /** Chaque feuille devient un fichier ; chaque dossier vide, une entrée dossier */
  async exportArchive<V>(tree: TreeMap<V>, encode: (value: V, path: string) => string | Uint8Array): Promise<Uint8Array> {
    const zip = new JSZip();
    const visit = (dir: DirNode<V>, base: string) => {
      for (const ch of dir.children) {
        const p = base ? `${base}${PATH_SEPARATOR}${ch.name}` : ch.name;
        if (ch.type === 'file') zip.file(p, encode(ch.value, p));
        else if (ch.children.length === 0) zip.folder(p);
        else visit(ch, p);
      }
    };
    visit(tree.root, '');
    return zip.generateAsync({ type: 'uint8array' });
  }
}

function cleanEntryName(name: string): string {
  return name.replace(/\\/g, '/').replace(/^\.?\/+/, '');
}

/** Plus long préfixe de dossiers commun à tous les chemins ("" si aucun) */
export function commonDirPrefix(paths: string[]): string {
  if (!paths.length) return '';
  let common = paths[0].split(PATH_SEPARATOR).slice(0, -1);
  for (let i = 1; i < paths.length && common.length; i++) {
    const dirs = paths[i].split(PATH_SEPARATOR).slice(0, -1);
    let j = 0;
    while (j < common.length && j < dirs.length && common[j] === dirs[j]) j++;
    common = common.slice(0, j);
  }
  return common.join(PATH_SEPARATOR);
}
