import { ShapeViolationError, isShapeViolation } from '../core/shape-violation.error';
import { DirNode, createDir, createFile } from './tree-node.model';
import { getChild, getMutChild, getName, getValue, makeDirectory, reduce, valueReduce, walk } from './tree-node';

describe('tree-node', () => {
  let home: DirNode<number>;

  beforeEach(() => {
    home = createDir<number>('home');
    const arthur = makeDirectory(home, 'arthur');
    arthur.children.push(createFile('answer.txt', 42));
    home.children.push(createFile('notes.md', 3));
    arthur.children.push(createFile('password.txt', 128));
  });

  it('should expose the name of both variants', () => {
    expect(getName(createFile('answer.txt', 42))).toBe('answer.txt');
    expect(getName(createDir('home'))).toBe('home');
  });

  it('should report a file value and a directory total', () => {
    expect(getValue(createFile('answer.txt', 42))).toBe(42);
    expect(getValue(home)).toBe(173);
    expect(getValue(createDir<number>('empty'))).toBe(0);
  });

  it('should find a child by exact name', () => {
    expect(getChild(home, 'arthur')?.type).toBe('dir');
    expect(getChild(home, 'Arthur')).toBeUndefined();
    expect(getChild(createFile('a', 1), 'a')).toBeUndefined();
  });

  it('should return the first match when names are duplicated', () => {
    const dir = createDir<number>('d');
    dir.children.push(createFile('x', 1), createFile('x', 2));
    const found = getMutChild(dir, 'x');
    expect(found).toEqual(createFile('x', 1));
  });

  it('should append directories without deduplicating', () => {
    const dir = createDir<number>('d');
    const first = makeDirectory(dir, 'sub');
    makeDirectory(dir, 'sub');
    expect(dir.children.length).toBe(2);
    expect(dir.children[0]).toBe(first);
    expect(first).toEqual({ type: 'dir', name: 'sub', children: [] });
  });

  it('should refuse to create a directory under a file', () => {
    expect(() => makeDirectory(createFile('a.txt', 1), 'sub'))
      .toThrowMatching(e => isShapeViolation(e, 'not-a-directory') && e.path === 'a.txt');
    expect(() => makeDirectory(createFile('a.txt', 1), 'sub')).toThrowError(ShapeViolationError);
  });

  it('should fold values pre-order, children before siblings', () => {
    const seen = valueReduce<number, number[]>(home, [], (acc, v) => [...acc, v]);
    expect(seen).toEqual([42, 128, 3]);
  });

  it('should pass leaf names to reduce', () => {
    const names = reduce(home, '', (acc, name, v) => `${acc}${name}=${v};`);
    expect(names).toBe('answer.txt=42;password.txt=128;notes.md=3;');
  });

  it('should ignore directories in folds', () => {
    const empty = createDir<number>('e');
    makeDirectory(empty, 'sub');
    expect(valueReduce(empty, 7, (acc, v) => acc + v)).toBe(7);
  });

  it('should walk every node with its depth', () => {
    const visited: string[] = [];
    walk(home, (n, depth) => visited.push(`${depth}:${n.name}`));
    expect(visited).toEqual(['0:home', '1:arthur', '2:answer.txt', '2:password.txt', '1:notes.md']);
  });
});
