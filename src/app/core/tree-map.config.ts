/** Nom du dossier racine implicite d’un TreeMap (jamais présent dans les chemins) */
export const ROOT_NAME = 'root';

/** Séparateur des segments de chemin. Aucune normalisation : découpe littérale. */
export const PATH_SEPARATOR = '/';

/** Indentation par niveau pour l’affichage diagnostique */
export const PRINT_INDENT = '  ';

export const DEBUG_LOGGING = process.env['TREE_MAP_DEBUG'] === '1';
