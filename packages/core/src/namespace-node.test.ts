/**
 * Tests for Namespace Nodes and the Child Index
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DirectoryNode, FileNode } from './namespace-node.js';

const T0 = new Date('2024-01-01T00:00:00Z');
const T1 = new Date('2024-01-01T00:05:00Z');

describe('FileNode', () => {
  it('starts empty with equal timestamps', () => {
    const file = new FileNode('a.txt', T0);

    expect(file.kind).toBe('file');
    expect(file.content).toBe('');
    expect(file.size).toBe(0);
    expect(file.createdAt).toEqual(T0);
    expect(file.modifiedAt).toEqual(T0);
    expect(file.parent).toBeNull();
  });

  it('write replaces content and stamps modification time', () => {
    const file = new FileNode('a.txt', T0);
    file.write('hello', T1);

    expect(file.content).toBe('hello');
    expect(file.size).toBe(5);
    expect(file.modifiedAt).toEqual(T1);
    expect(file.createdAt).toEqual(T0);
  });

  it('measures size in UTF-8 bytes', () => {
    const file = new FileNode('a.txt', T0);
    file.write('é', T1);
    expect(file.size).toBe(2);
  });

  it('never lets modifiedAt precede createdAt', () => {
    const file = new FileNode('a.txt', T1);
    file.write('x', T0);
    expect(file.modifiedAt).toEqual(T1);
  });
});

describe('timestamp isolation', () => {
  it('keeps its own copy of the construction time', () => {
    const at = new Date(T0.getTime());
    const file = new FileNode('a.txt', at);
    at.setTime(0);
    expect(file.createdAt).toEqual(T0);
  });

  it('hands out copies that do not write back', () => {
    const file = new FileNode('a.txt', T0);
    file.createdAt.setTime(0);
    file.modifiedAt.setTime(0);
    expect(file.createdAt).toEqual(T0);
    expect(file.modifiedAt).toEqual(T0);
  });
});

describe('DirectoryNode', () => {
  let dir: DirectoryNode;

  beforeEach(() => {
    dir = new DirectoryNode('docs', T0);
  });

  it('starts empty', () => {
    expect(dir.kind).toBe('directory');
    expect(dir.isEmpty).toBe(true);
    expect(dir.childCount).toBe(0);
    expect(dir.children).toEqual([]);
  });

  it('addChild appends in order, indexes, and sets parent', () => {
    const b = new FileNode('b.txt', T0);
    const a = new DirectoryNode('a', T0);
    dir.addChild(b);
    dir.addChild(a);

    expect(dir.children.map((c) => c.name)).toEqual(['b.txt', 'a']);
    expect(dir.getChild('a')).toBe(a);
    expect(dir.hasChild('b.txt')).toBe(true);
    expect(b.parent).toBe(dir);
    expect(a.parent).toBe(dir);
  });

  it('lookups are case-sensitive', () => {
    dir.addChild(new FileNode('Notes', T0));
    expect(dir.hasChild('notes')).toBe(false);
    expect(dir.getChild('notes')).toBeUndefined();
  });

  it('removeChild detaches from both sequence and index', () => {
    const a = new FileNode('a', T0);
    const b = new FileNode('b', T0);
    const c = new FileNode('c', T0);
    dir.addChild(a);
    dir.addChild(b);
    dir.addChild(c);

    const removed = dir.removeChild('b');

    expect(removed).toBe(b);
    expect(b.parent).toBeNull();
    expect(dir.children.map((n) => n.name)).toEqual(['a', 'c']);
    expect(dir.hasChild('b')).toBe(false);
    expect(dir.childCount).toBe(2);
  });

  it('removeChild of an unknown name changes nothing', () => {
    dir.addChild(new FileNode('a', T0));
    expect(dir.removeChild('zzz')).toBeUndefined();
    expect(dir.childCount).toBe(1);
  });

  it('dispose releases the whole subtree', () => {
    const inner = new DirectoryNode('inner', T0);
    const leaf = new FileNode('leaf.txt', T0);
    inner.addChild(leaf);
    dir.addChild(inner);

    dir.dispose();

    expect(dir.isEmpty).toBe(true);
    expect(inner.isEmpty).toBe(true);
    expect(inner.parent).toBeNull();
    expect(leaf.parent).toBeNull();
    expect(dir.hasChild('inner')).toBe(false);
  });
});
