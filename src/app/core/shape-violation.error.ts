/**
 * Violation de forme : l’appelant a traité un fichier comme un dossier (ou l’inverse),
 * ou désigné un chemin qui devait exister.
 * L’absence simple d’un nœud en lecture n’en est pas une : les lectures renvoient `undefined`.
 */
export type ShapeViolationKind =
  | 'not-a-directory'
  | 'not-a-file'
  | 'not-found'
  | 'already-exists';

const MESSAGES: Record<ShapeViolationKind, string> = {
  'not-a-directory': 'Le chemin n’est pas un dossier',
  'not-a-file': 'Pas de taille définie sur un dossier',
  'not-found': 'Chemin introuvable',
  'already-exists': 'Le chemin existe déjà',
};

export class ShapeViolationError extends Error {
  constructor(readonly kind: ShapeViolationKind, readonly path: string) {
    super(`${MESSAGES[kind]}: ${path}`);
    this.name = 'ShapeViolationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isShapeViolation(e: unknown, kind?: ShapeViolationKind): e is ShapeViolationError {
  return e instanceof ShapeViolationError && (kind === undefined || e.kind === kind);
}
