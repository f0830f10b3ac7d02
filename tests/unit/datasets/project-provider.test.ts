import { describe, expect, it } from 'vitest';
import { stringify as stringifyYaml } from 'yaml';

import { readAll } from '@/common/utils/streams.js';
import { createProjectClient } from '@/modules/datasets/shell/providers/project.js';

import { makeTestDataset, makeTestFile } from '../../fixtures/builders.js';
import { makeFakeRepository, type FakeRepository } from '../../fixtures/fakes.js';

import type { ProviderRef } from '@/modules/datasets/core/types.js';

const GIT_URI = 'https://lab.test/group/survey.git';
const DATASET_URI = 'https://lab.test/projects/group/survey/datasets/census';

const CENSUS = makeTestDataset({
  name: 'census',
  title: 'Census',
  keywords: ['population'],
  files: [
    makeTestFile('census', 'a.csv'),
    makeTestFile('census', 'linked.csv', { external: true }),
  ],
});

const makeRemote = (): FakeRepository => {
  const repository = makeFakeRepository();
  repository.setRemote(GIT_URI, {
    head: 'c1',
    commits: {
      c1: {
        '.datasets/ds-census/metadata.yml': stringifyYaml({ schemaVersion: 1, ...CENSUS }),
        'data/census/a.csv': 'a,b\n',
      },
    },
  });
  return repository;
};

const refFor = (uri: string, id: string): ProviderRef => ({ provider: 'project', uri, id });

describe('project provider', () => {
  it('recognises project dataset URLs', () => {
    const client = createProjectClient({ repository: makeRemote() });

    expect(client.parseUri(DATASET_URI)).toEqual(refFor(DATASET_URI, 'census'));
    expect(client.parseUri('https://lab.test/group/survey')).toBeNull();
    expect(client.parseUri('doi:10.1234/abc')).toBeNull();
  });

  it('reads metadata from the default branch', async () => {
    const client = createProjectClient({ repository: makeRemote() });

    const record = (await client.fetchMetadata(refFor(DATASET_URI, 'census')))._unsafeUnwrap();

    expect(record).toMatchObject({
      title: 'Census',
      keywords: ['population'],
      creators: CENSUS.creators,
      version: 'c1',
    });
  });

  it('finds a dataset by id as well as by name', async () => {
    const uri = 'https://lab.test/projects/group/survey/datasets/ds-census';
    const client = createProjectClient({ repository: makeRemote() });

    const record = await client.fetchMetadata(refFor(uri, 'ds-census'));

    expect(record._unsafeUnwrap().title).toBe('Census');
  });

  it('lists tracked files and skips linked ones', async () => {
    const client = createProjectClient({ repository: makeRemote() });
    const ref = refFor(DATASET_URI, 'census');
    await client.fetchMetadata(ref);

    const files = (await client.fetchFiles(ref))._unsafeUnwrap();

    expect(files.map(({ path, size, url }) => ({ path, size, url }))).toEqual([
      { path: 'a.csv', size: null, url: GIT_URI },
    ]);
    const content = (await files[0]?.open())?._unsafeUnwrap();
    expect(content === undefined ? '' : new TextDecoder().decode(await readAll(content))).toBe('a,b\n');
  });

  it('reports unknown datasets', async () => {
    const uri = 'https://lab.test/projects/group/survey/datasets/missing';
    const client = createProjectClient({ repository: makeRemote() });

    const error = (await client.fetchMetadata(refFor(uri, 'missing')))._unsafeUnwrapErr();

    expect(error.type).toBe('DatasetNotFound');
  });

  it('rejects remote metadata that fails validation', async () => {
    const repository = makeRemote();
    repository.setRemote(GIT_URI, {
      head: 'c2',
      commits: { c2: { '.datasets/ds-census/metadata.yml': 'name: census\n' } },
    });
    const client = createProjectClient({ repository });

    const error = (await client.fetchMetadata(refFor(DATASET_URI, 'census')))._unsafeUnwrapErr();

    expect(error.type).toBe('MetadataError');
  });

  it('does not export', async () => {
    const client = createProjectClient({ repository: makeRemote() });

    expect(client.exportable).toBe(false);
    const error = await client.createDraft(
      {
        title: 'Census',
        description: '',
        creators: [],
        keywords: [],
        license: null,
        language: null,
        version: 'v1',
        files: [],
        publish: false,
      },
      'test-secret'
    );
    expect(error._unsafeUnwrapErr().type).toBe('UnsupportedOperationError');
  });
});
