import { createFolderNode } from '../modules/namespace/node';
import { searchTree } from '../modules/namespace/search';
import { TreeMutator } from '../modules/namespace/tree-mutator';
import type { FolderNode, SearchCriteria } from '../types/namespace';

function buildTree(): FolderNode {
  const root = createFolderNode('root');
  const mutator = new TreeMutator(root);

  mutator.addFile('/root', 'readme.md', { author: 'Sam Lee', tags: ['Draft', 'v1'], fileType: 'md' });
  mutator.createFolder('/root', 'docs');
  mutator.addFile('/root/docs', 'a.txt', { author: 'Sam', tags: 'draft,v1', fileType: 'TXT' });
  mutator.addFile('/root/docs', 'report.pdf', { author: 'Alex', tags: 'final', fileType: 'pdf' });
  mutator.createFolder('/root/docs', 'drafts');
  mutator.addFile('/root/docs/drafts', 'notes-draft.txt', { author: 'alex', tags: 'draft', fileType: 'txt' });
  mutator.createFolder('/root', 'photos');
  mutator.addFile('/root/photos', 'beach.jpg', { tags: 'holiday', fileType: 'jpg' });

  return root;
}

function paths(criteria: SearchCriteria): string[] {
  const result = searchTree(buildTree(), criteria);
  if (!result.ok) {
    throw new Error(`search failed: ${result.error.kind}`);
  }
  return result.value.map((match) => match.fullPath);
}

describe('searchTree', () => {
  it('refuses a query without criteria', () => {
    expect(searchTree(buildTree(), {})).toEqual({
      ok: false,
      error: { kind: 'InvalidQuery', reason: 'no-criteria' }
    });
    expect(searchTree(buildTree(), { name: '  ', tags: ' , ' }).ok).toBe(false);
  });

  it('finds the root folder by name', () => {
    expect(searchTree(buildTree(), { name: 'root' })).toEqual({
      ok: true,
      value: [{ name: 'root', type: 'folder', fullPath: '/root' }]
    });
  });

  it('visits a folder, then its files, then its child folders', () => {
    expect(paths({ name: 'draft' })).toEqual([
      '/root/docs/drafts',
      '/root/docs/drafts/notes-draft.txt'
    ]);
    expect(paths({ name: 'A' })).toEqual([
      '/root/readme.md',
      '/root/docs/a.txt',
      '/root/docs/drafts',
      '/root/docs/drafts/notes-draft.txt',
      '/root/photos/beach.jpg'
    ]);
  });

  it('matches authors as a case-insensitive substring and skips folders', () => {
    expect(paths({ author: 'sam' })).toEqual(['/root/readme.md', '/root/docs/a.txt']);
  });

  it('matches when any of the supplied tags is present', () => {
    expect(paths({ tags: 'final, holiday' })).toEqual(['/root/docs/report.pdf', '/root/photos/beach.jpg']);
    expect(paths({ tags: 'DRAFT' })).toEqual([
      '/root/readme.md',
      '/root/docs/a.txt',
      '/root/docs/drafts/notes-draft.txt'
    ]);
  });

  it('compares the file type exactly, ignoring case', () => {
    expect(paths({ fileType: 'TXT' })).toEqual(['/root/docs/a.txt', '/root/docs/drafts/notes-draft.txt']);
    expect(paths({ fileType: 'tx' })).toEqual([]);
  });

  it('requires every supplied criterion to match', () => {
    expect(paths({ name: 'txt', author: 'alex' })).toEqual(['/root/docs/drafts/notes-draft.txt']);
    expect(paths({ name: 'd', fileType: 'txt' })).toEqual(['/root/docs/drafts/notes-draft.txt']);
  });

  it('reports file metadata alongside the path', () => {
    const result = searchTree(buildTree(), { name: 'a.txt' });

    expect(result).toEqual({
      ok: true,
      value: [
        {
          name: 'a.txt',
          type: 'file',
          fullPath: '/root/docs/a.txt',
          author: 'Sam',
          fileType: 'txt',
          tags: ['draft', 'v1']
        }
      ]
    });
  });
});
