import { NamespaceCorruptionError } from '../modules/namespace/namespace.errors';
import { createFolderNode } from '../modules/namespace/node';
import { TreeMutator } from '../modules/namespace/tree-mutator';
import type { FolderNode } from '../types/namespace';

function setup(): { root: FolderNode; mutator: TreeMutator } {
  const root = createFolderNode('root');
  return { root, mutator: new TreeMutator(root) };
}

describe('TreeMutator', () => {
  describe('createFolder', () => {
    it('appends an empty folder under the parent', () => {
      const { root, mutator } = setup();

      const created = mutator.createFolder('/root', 'docs');

      expect(created).toEqual({
        ok: true,
        value: { folder: { name: 'docs', type: 'folder', children: [], files: [] }, path: '/root/docs' }
      });
      expect(root.children.map((child) => child.name)).toEqual(['docs']);
    });

    it('rejects a second folder with the same name', () => {
      const { root, mutator } = setup();
      mutator.createFolder('/root', 'docs');

      const second = mutator.createFolder('/root', 'docs');

      expect(second).toEqual({
        ok: false,
        error: { kind: 'DuplicateName', path: '/root', name: 'docs', nodeType: 'folder' }
      });
      expect(root.children).toHaveLength(1);
    });

    it('reports a parent that does not resolve', () => {
      const { mutator } = setup();

      expect(mutator.createFolder('/root/nope', 'x')).toEqual({
        ok: false,
        error: { kind: 'ParentNotFound', path: '/root/nope', segment: 'nope', depth: 1 }
      });
    });

    it('rejects an empty name before touching the tree', () => {
      const { root, mutator } = setup();

      expect(mutator.createFolder('/root', '')).toEqual({
        ok: false,
        error: { kind: 'InvalidInput', field: 'folderName', reason: 'empty' }
      });
      expect(root.children).toHaveLength(0);
    });

    it('reserves the root name directly under the root only', () => {
      const { mutator } = setup();
      mutator.createFolder('/root', 'docs');

      expect(mutator.createFolder('/root', 'root')).toEqual({
        ok: false,
        error: {
          kind: 'ForbiddenOperation',
          operation: 'create-reserved-name',
          path: '/root',
          name: 'root'
        }
      });
      expect(mutator.createFolder('/root/docs', 'root').ok).toBe(true);
    });

    it('lets a file and a folder share a name', () => {
      const { root, mutator } = setup();

      expect(mutator.createFolder('/root', 'shared').ok).toBe(true);
      expect(mutator.addFile('/root', 'shared').ok).toBe(true);
      expect(root.children).toHaveLength(1);
      expect(root.files).toHaveLength(1);
    });
  });

  describe('deleteFolder', () => {
    it('never deletes the root folder', () => {
      const { mutator } = setup();

      expect(mutator.deleteFolder('/root', 'root')).toEqual({
        ok: false,
        error: { kind: 'ForbiddenOperation', operation: 'delete-root', path: '/root', name: 'root' }
      });
      expect(mutator.deleteFolder('', 'root')).toEqual({
        ok: false,
        error: { kind: 'ForbiddenOperation', operation: 'delete-root', path: '/', name: 'root' }
      });
    });

    it('detaches the whole subtree together with its original path', () => {
      const { root, mutator } = setup();
      mutator.createFolder('/root', 'docs');
      mutator.createFolder('/root/docs', 'drafts');
      mutator.addFile('/root/docs/drafts', 'plan.md');
      mutator.addFile('/root/docs', 'a.txt');

      const detached = mutator.deleteFolder('/root', 'docs');

      expect(detached.ok).toBe(true);
      if (!detached.ok) return;
      expect(detached.value.originalPath).toBe('/root/docs');
      expect(detached.value.item.children[0].files[0].name).toBe('plan.md');
      expect(detached.value.item.files[0].name).toBe('a.txt');
      expect(root.children).toHaveLength(0);
    });

    it('reports a missing child folder', () => {
      const { mutator } = setup();

      expect(mutator.deleteFolder('/root', 'ghost')).toEqual({
        ok: false,
        error: { kind: 'NotFound', target: 'folder', path: '/root', name: 'ghost' }
      });
    });
  });

  describe('files', () => {
    it('rejects a duplicate file name in the same folder', () => {
      const { mutator } = setup();
      mutator.addFile('/root', 'a.txt');

      expect(mutator.addFile('/root', 'a.txt')).toEqual({
        ok: false,
        error: { kind: 'DuplicateName', path: '/root', name: 'a.txt', nodeType: 'file' }
      });
    });

    it('detaches a single file with its full path', () => {
      const { root, mutator } = setup();
      mutator.createFolder('/root', 'docs');
      mutator.addFile('/root/docs', 'a.txt', { author: 'Sam' });

      const detached = mutator.deleteFile('/root/docs', 'a.txt');

      expect(detached.ok && detached.value.originalPath).toBe('/root/docs/a.txt');
      expect(detached.ok && detached.value.item.author).toBe('Sam');
      expect(root.children[0].files).toHaveLength(0);
    });

    it('reports a missing file', () => {
      const { mutator } = setup();

      expect(mutator.deleteFile('/root', 'nothing.txt')).toEqual({
        ok: false,
        error: { kind: 'NotFound', target: 'file', path: '/root', name: 'nothing.txt' }
      });
    });

    it('looks a file up by name inside one folder', () => {
      const { mutator } = setup();
      mutator.createFolder('/root', 'docs');
      for (const name of ['c.txt', 'a.txt', 'b.txt']) {
        mutator.addFile('/root/docs', name);
      }

      const found = mutator.lookupFile('/root/docs', 'b.txt');

      expect(found.ok && found.value.fullPath).toBe('/root/docs/b.txt');
      expect(found.ok && found.value.file.name).toBe('b.txt');
      expect(mutator.lookupFile('/root/docs', 'd.txt')).toEqual({
        ok: false,
        error: { kind: 'NotFound', target: 'file', path: '/root/docs', name: 'd.txt' }
      });
    });
  });

  describe('restore', () => {
    it('re-attaches a detached file at its original parent', () => {
      const { root, mutator } = setup();
      mutator.createFolder('/root', 'docs');
      mutator.addFile('/root/docs', 'a.txt');
      const detached = mutator.deleteFile('/root/docs', 'a.txt');
      if (!detached.ok) throw new Error('setup failed');

      const restored = mutator.restore(detached.value);

      expect(restored).toEqual({ ok: true, value: detached.value });
      expect(root.children[0].files[0]).toBe(detached.value.item);
    });

    it('fails when the original parent no longer exists', () => {
      const { mutator } = setup();
      mutator.createFolder('/root', 'docs');
      mutator.addFile('/root/docs', 'a.txt');
      const file = mutator.deleteFile('/root/docs', 'a.txt');
      mutator.deleteFolder('/root', 'docs');
      if (!file.ok) throw new Error('setup failed');

      expect(mutator.restore(file.value)).toEqual({
        ok: false,
        error: {
          kind: 'OriginalLocationMissing',
          originalPath: '/root/docs/a.txt',
          parentPath: '/root/docs'
        }
      });
    });

    it('surfaces a name reused since deletion instead of overwriting it', () => {
      const { root, mutator } = setup();
      mutator.addFile('/root', 'a.txt', { author: 'first' });
      const detached = mutator.deleteFile('/root', 'a.txt');
      mutator.addFile('/root', 'a.txt', { author: 'second' });
      if (!detached.ok) throw new Error('setup failed');

      expect(mutator.restore(detached.value)).toEqual({
        ok: false,
        error: { kind: 'DuplicateName', path: '/root', name: 'a.txt', nodeType: 'file' }
      });
      expect(root.files.map((file) => file.author)).toEqual(['second']);
    });

    it('treats a recorded path without a parent as corruption', () => {
      const { mutator } = setup();

      expect(() =>
        mutator.restore({ item: createFolderNode('root'), originalPath: '/root' })
      ).toThrow(NamespaceCorruptionError);
    });
  });
});
