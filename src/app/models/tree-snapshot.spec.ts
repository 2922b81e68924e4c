import { createDemoTree } from '../seeds/demo-tree.seed';
import { deserializeTree, serializeTree } from './tree-snapshot';

describe('tree-snapshot', () => {
  it('should serialize to plain nested objects', () => {
    const snap = serializeTree(createDemoTree());
    expect(snap).toEqual({
      type: 'dir', name: 'root', children: [
        {
          type: 'dir', name: 'home', children: [
            {
              type: 'dir', name: 'users', children: [
                {
                  type: 'dir', name: 'arthur', children: [
                    { type: 'file', name: 'answer.txt', value: 42 },
                    { type: 'file', name: 'password.txt', value: 128 },
                  ],
                },
                { type: 'dir', name: 'ford', children: [] },
              ],
            },
          ],
        },
      ],
    });
  });

  it('should rebuild an equivalent tree from JSON text', () => {
    const raw: unknown = JSON.parse(JSON.stringify(serializeTree(createDemoTree())));
    const tree = deserializeTree(raw, (v): v is number => typeof v === 'number');
    expect(tree.valueSum()).toBe(170);
    expect(tree.getSize('home/users/arthur/password.txt')).toBe(128);
    expect(tree.getChildren('home/users/ford')).toEqual([]);
  });

  it('should reject a malformed snapshot', () => {
    expect(() => deserializeTree({ type: 'file', name: 'x', value: 1 }))
      .toThrowError('Snapshot invalide: la racine doit être un dossier');
    expect(() => deserializeTree({ type: 'dir', name: 'root' }))
      .toThrowError('Snapshot invalide: enfants manquants sous root');
    expect(() => deserializeTree({ type: 'dir', name: 'root', children: [{ type: 'link', name: 'l' }] }))
      .toThrowError('Snapshot invalide: type inconnu pour root/l');
    expect(() => deserializeTree({ type: 'dir', name: 'root', children: [{ type: 'file' }] }))
      .toThrowError('Snapshot invalide: nœud sans nom sous root');
  });

  it('should reject same-named siblings', () => {
    const raw = {
      type: 'dir', name: 'root', children: [
        { type: 'dir', name: 'home', children: [
          { type: 'file', name: 'a.txt', value: 1 },
          { type: 'dir', name: 'a.txt', children: [] },
        ] },
      ],
    };
    expect(() => deserializeTree(raw)).toThrowError('Snapshot invalide: nom en double sous root/home: a.txt');
  });

  it('should validate leaf values when asked', () => {
    const raw = { type: 'dir', name: 'root', children: [{ type: 'file', name: 'a', value: 'big' }] };
    expect(() => deserializeTree(raw, (v): v is number => typeof v === 'number'))
      .toThrowError('Snapshot invalide: valeur refusée pour root/a');
    expect(deserializeTree(raw).getSize('a')).toBe('big');
  });
});
