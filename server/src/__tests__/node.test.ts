import {
  cloneNode,
  countNodes,
  createFileNode,
  createFolderNode,
  parseTags,
  sortFolderByName,
  validateName
} from '../modules/namespace/node';

describe('node model', () => {
  it('splits comma-separated tags into trimmed, non-empty terms', () => {
    expect(parseTags(' draft, v1 ,,draft ')).toEqual(['draft', 'v1', 'draft']);
    expect(parseTags('')).toEqual([]);
  });

  it('builds file records with normalised metadata', () => {
    const file = createFileNode('a.TXT', {
      fileType: ' TXT ',
      tags: 'x, y',
      createdDate: '2026-01-01T00:00:00.000Z'
    });

    expect(file).toEqual({
      name: 'a.TXT',
      type: 'file',
      author: '',
      fileType: 'txt',
      tags: ['x', 'y'],
      createdDate: '2026-01-01T00:00:00.000Z'
    });
  });

  it('cleans tags given as a list without reordering them', () => {
    expect(createFileNode('b', { tags: [' b ', '', 'a'] }).tags).toEqual(['b', 'a']);
  });

  it('rejects empty names and names containing a slash', () => {
    expect(validateName('   ', 'folderName')).toEqual({
      ok: false,
      error: { kind: 'InvalidInput', field: 'folderName', reason: 'empty' }
    });
    expect(validateName('a/b', 'fileName')).toEqual({
      ok: false,
      error: { kind: 'InvalidInput', field: 'fileName', reason: 'contains-separator' }
    });
    expect(validateName('notes', 'fileName')).toEqual({ ok: true, value: 'notes' });
  });

  it('counts a folder together with every descendant', () => {
    const folder = createFolderNode('docs');
    folder.files.push(createFileNode('a'), createFileNode('b'));
    const nested = createFolderNode('nested');
    nested.files.push(createFileNode('c'));
    folder.children.push(nested);

    expect(countNodes(folder)).toBe(5);
    expect(countNodes(createFileNode('solo'))).toBe(1);
  });

  it('clones without sharing nested arrays', () => {
    const folder = createFolderNode('docs');
    folder.files.push(createFileNode('a', { tags: ['t'] }));

    const copy = cloneNode(folder);
    copy.files[0].tags.push('extra');
    copy.children.push(createFolderNode('new'));

    expect(folder.files[0].tags).toEqual(['t']);
    expect(folder.children).toHaveLength(0);
  });

  it('sorts folders and files by name for display', () => {
    const root = createFolderNode('root');
    root.children.push(createFolderNode('b'), createFolderNode('a'));
    root.files.push(createFileNode('z.txt'), createFileNode('m.txt'));

    const sorted = sortFolderByName(root);

    expect(sorted.children.map((child) => child.name)).toEqual(['a', 'b']);
    expect(sorted.files.map((file) => file.name)).toEqual(['m.txt', 'z.txt']);
    expect(root.children.map((child) => child.name)).toEqual(['b', 'a']);
  });
});
