import { createFileNode, createFolderNode } from '../modules/namespace/node';
import {
  isRootPath,
  lastSegmentOf,
  normalizePath,
  parentPathOf,
  resolveFolder,
  splitPath
} from '../modules/namespace/path-resolver';
import type { FolderNode } from '../types/namespace';

function buildTree(): { root: FolderNode; docs: FolderNode; drafts: FolderNode } {
  const root = createFolderNode('root');
  const docs = createFolderNode('docs');
  const drafts = createFolderNode('drafts');
  docs.children.push(drafts);
  docs.files.push(createFileNode('notes.txt'));
  root.children.push(docs);
  return { root, docs, drafts };
}

describe('path resolver', () => {
  it('drops empty segments from leading, trailing and repeated slashes', () => {
    expect(splitPath('//root//docs/')).toEqual(['root', 'docs']);
    expect(normalizePath('root//docs')).toBe('/root/docs');
  });

  it('resolves the bare root token to the root folder', () => {
    const { root } = buildTree();

    const resolved = resolveFolder(root, 'root');

    expect(resolved.ok && resolved.value).toBe(root);
  });

  it('walks nested folder names to the exact node', () => {
    const { root, drafts } = buildTree();

    const resolved = resolveFolder(root, '/root/docs/drafts');

    expect(resolved.ok && resolved.value).toBe(drafts);
  });

  it('reports the first segment that failed and its depth', () => {
    const { root } = buildTree();

    expect(resolveFolder(root, '/root/missing/deeper')).toEqual({
      ok: false,
      error: {
        kind: 'NotFound',
        target: 'path',
        path: '/root/missing/deeper',
        segment: 'missing',
        depth: 1
      }
    });
  });

  it('requires the path to start at the root', () => {
    const { root } = buildTree();

    expect(resolveFolder(root, '/home/docs')).toEqual({
      ok: false,
      error: { kind: 'NotFound', target: 'path', path: '/home/docs', segment: 'home', depth: 0 }
    });
    expect(resolveFolder(root, '')).toEqual({
      ok: false,
      error: { kind: 'NotFound', target: 'path', path: '', segment: null, depth: 0 }
    });
  });

  it('matches names case-sensitively', () => {
    const { root } = buildTree();

    const resolved = resolveFolder(root, '/root/Docs');

    expect(resolved.ok).toBe(false);
  });

  it('never treats a file name as a path segment', () => {
    const { root } = buildTree();

    expect(resolveFolder(root, '/root/docs/notes.txt')).toEqual({
      ok: false,
      error: {
        kind: 'NotFound',
        target: 'path',
        path: '/root/docs/notes.txt',
        segment: 'notes.txt',
        depth: 2
      }
    });
  });

  it('derives parent paths and final segments', () => {
    expect(parentPathOf('/root/docs/a.txt')).toBe('/root/docs');
    expect(parentPathOf('/root')).toBeNull();
    expect(lastSegmentOf('/root/docs/a.txt')).toBe('a.txt');
    expect(lastSegmentOf('/')).toBeNull();
    expect(isRootPath('/root/')).toBe(true);
    expect(isRootPath('/root/docs')).toBe(false);
  });
});
