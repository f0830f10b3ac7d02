import { describe, expect, it } from 'vitest';

import { listTags } from '@/modules/datasets/core/usecases/list-tags.js';
import { removeTags } from '@/modules/datasets/core/usecases/remove-tags.js';
import { tagDataset } from '@/modules/datasets/core/usecases/tag-dataset.js';

import { NOW, makeTestDataset, makeTestDeps, makeTestFile } from '../../fixtures/builders.js';
import { fixedClock, makeFakeDatasetStore } from '../../fixtures/fakes.js';

const makeDeps = () =>
  makeTestDeps({
    store: makeFakeDatasetStore([
      makeTestDataset({ name: 'D1', version: '0.9', files: [makeTestFile('D1', 'a.csv', { checksum: 'aaa' })] }),
    ]),
  });

describe('tagDataset', () => {
  it('binds the tag to the current commit and freezes the file records', async () => {
    const deps = makeDeps();
    deps.repository.setCurrentCommit('abc123');

    const tag = (await tagDataset(deps, { name: 'D1', tag: '1.0', description: 'first' }))._unsafeUnwrap();

    expect(tag).toEqual({
      name: '1.0',
      description: 'first',
      created: NOW,
      commit: 'abc123',
      snapshot: { version: '0.9', files: [makeTestFile('D1', 'a.csv', { checksum: 'aaa' })] },
    });
  });

  it('keeps the snapshot when the dataset changes later', async () => {
    const deps = makeDeps();
    await tagDataset(deps, { name: 'D1', tag: '1.0' });

    const stored = (await deps.store.findByName('D1'))._unsafeUnwrap();
    if (stored === null) {
      throw new Error('dataset missing');
    }
    await deps.store.save({ ...stored, files: [makeTestFile('D1', 'a.csv', { checksum: 'bbb' })] });

    const [tag] = (await deps.store.loadTags(stored))._unsafeUnwrap();
    expect(tag?.snapshot.files[0]?.checksum).toBe('aaa');
  });

  it('refuses duplicates unless forced', async () => {
    const deps = makeDeps();
    await tagDataset(deps, { name: 'D1', tag: '1.0', description: 'first' });

    const duplicate = await tagDataset(deps, { name: 'D1', tag: '1.0' });
    expect(duplicate._unsafeUnwrapErr().message).toBe(
      "Tag '1.0' already exists on dataset 'D1'; use force to overwrite it"
    );

    deps.repository.setCurrentCommit('def456');
    const forced = await tagDataset(deps, { name: 'D1', tag: '1.0', description: 'again', force: true });
    expect(forced._unsafeUnwrap().commit).toBe('def456');

    const tags = (await listTags(deps, { name: 'D1' }))._unsafeUnwrap();
    expect(tags.map((tag) => [tag.name, tag.description])).toEqual([['1.0', 'again']]);
  });

  it('validates tag names', async () => {
    const result = await tagDataset(makeDeps(), { name: 'D1', tag: 'bad tag' });

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('InvalidInputError');
  });

  it('fails for unknown datasets', async () => {
    expect((await tagDataset(makeDeps(), { name: 'nope', tag: '1.0' }))._unsafeUnwrapErr().type).toBe(
      'DatasetNotFound'
    );
  });
});

describe('listTags', () => {
  it('orders tags by creation time', async () => {
    const deps = makeDeps();
    await tagDataset({ ...deps, clock: fixedClock('2024-03-01T00:00:00.000Z') }, { name: 'D1', tag: 'b' });
    await tagDataset({ ...deps, clock: fixedClock('2024-02-01T00:00:00.000Z') }, { name: 'D1', tag: 'a' });

    const tags = (await listTags(deps, { name: 'D1' }))._unsafeUnwrap();

    expect(tags.map((tag) => tag.name)).toEqual(['a', 'b']);
    expect(tags[0]?.fileCount).toBe(1);
  });
});

describe('removeTags', () => {
  it('removes the named tags and reports unknown ones', async () => {
    const deps = makeDeps();
    await tagDataset(deps, { name: 'D1', tag: '1.0' });

    const result = (await removeTags(deps, { name: 'D1', tags: ['1.0', '2.0'] }))._unsafeUnwrap();

    expect(result).toEqual({ removed: ['1.0'], unknown: ['2.0'] });
    expect((await listTags(deps, { name: 'D1' }))._unsafeUnwrap()).toEqual([]);
  });

  it('does not rewrite tags when none match', async () => {
    const deps = makeDeps();

    const result = (await removeTags(deps, { name: 'D1', tags: ['1.0'] }))._unsafeUnwrap();

    expect(result).toEqual({ removed: [], unknown: ['1.0'] });
    expect(deps.store.tags.size).toBe(0);
  });
});
