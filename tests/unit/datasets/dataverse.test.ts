import { ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { createDataverseClient } from '@/modules/datasets/shell/providers/dataverse.js';
import { createHttpClient } from '@/modules/datasets/shell/providers/http.js';

import {
  bytes,
  jsonResponse,
  makeFakeFetch,
  makeSilentLogger,
  streamOf,
  type FakeRoute,
} from '../../fixtures/fakes.js';

import type { ExportDraft } from '@/modules/datasets/core/ports.js';
import type { ProviderRef } from '@/modules/datasets/core/types.js';

const SERVER = 'https://dv.test';
const PID = 'doi:10.7910/DVN/ABC123';
const ENCODED_PID = 'doi%3A10.7910%2FDVN%2FABC123';
const DATASET_URL = `${SERVER}/api/datasets/:persistentId/?persistentId=${ENCODED_PID}`;

const REF: ProviderRef = {
  provider: 'dataverse',
  uri: `${SERVER}/dataset.xhtml?persistentId=${PID}`,
  id: PID,
};

const DATASET = {
  data: {
    publicationDate: '2022-01-02',
    latestVersion: {
      versionNumber: 2,
      versionMinorNumber: 1,
      license: { name: 'CC0 1.0' },
      metadataBlocks: {
        citation: {
          fields: [
            { typeName: 'title', value: 'Soil samples' },
            {
              typeName: 'author',
              value: [
                { authorName: { value: 'Doe, Jane' }, authorAffiliation: { value: 'Field Lab' } },
                { authorName: { value: 'Roe, Rick' } },
              ],
            },
            { typeName: 'dsDescription', value: [{ dsDescriptionValue: { value: 'Core samples' } }] },
            { typeName: 'keyword', value: [{ keywordValue: { value: 'soil' } }] },
          ],
        },
      },
      files: [
        { label: 'cores.csv', directoryLabel: 'raw', dataFile: { id: 42, filesize: 5 } },
        { label: 'readme.txt', dataFile: { id: 43 } },
      ],
    },
  },
};

const makeClient = (routes: Record<string, FakeRoute> = {}, dataverseName?: string) => {
  const fake = makeFakeFetch(routes);
  const http = createHttpClient({
    fetch: fake.fetch,
    retries: 0,
    retryDelayMs: 0,
    logger: makeSilentLogger(),
  });
  return {
    client: createDataverseClient({ http, serverUrl: SERVER, dataverseName }),
    requests: fake.requests,
  };
};

const makeDraft = (overrides: Partial<ExportDraft> = {}): ExportDraft => ({
  title: 'Soil survey',
  description: 'Cores from the north field',
  creators: [{ name: 'Ada Lovelace', email: 'ada@example.com', affiliation: 'Field Lab' }],
  keywords: ['soil'],
  license: null,
  language: null,
  version: 'v1',
  files: [{ path: 'raw/cores.csv', size: 5, open: async () => ok(streamOf(bytes('depth'))) }],
  publish: true,
  ...overrides,
});

describe('dataverse client', () => {
  describe('parseUri', () => {
    const { client } = makeClient();

    it('accepts Dataverse DOIs against the configured server', () => {
      expect(client.parseUri(PID)).toEqual(REF);
      expect(client.parseUri('https://doi.org/10.7910/DVN/ABC123')).toEqual(REF);
    });

    it('takes the server from dataset page URLs', () => {
      expect(client.parseUri('https://other.test/dataset.xhtml?persistentId=doi:10.1234/XYZ')).toEqual({
        provider: 'dataverse',
        uri: 'https://other.test/dataset.xhtml?persistentId=doi:10.1234/XYZ',
        id: 'doi:10.1234/XYZ',
      });
    });

    it('rejects anything else', () => {
      expect(client.parseUri('https://example.org/data')).toBeNull();
      expect(client.parseUri('10.5281/zenodo.1')).toBeNull();
    });
  });

  it('maps the citation block of the latest version', async () => {
    const { client, requests } = makeClient({ [`GET ${DATASET_URL}`]: () => jsonResponse(DATASET) });

    const record = (await client.fetchMetadata(REF))._unsafeUnwrap();

    expect(record).toEqual({
      ref: REF,
      title: 'Soil samples',
      description: 'Core samples',
      creators: [
        { name: 'Doe, Jane', email: null, affiliation: 'Field Lab' },
        { name: 'Roe, Rick', email: null, affiliation: null },
      ],
      keywords: ['soil'],
      license: 'CC0 1.0',
      language: null,
      datePublished: '2022-01-02',
      version: '2.1',
    });
    expect(requests.map((request) => request.url)).toEqual([DATASET_URL]);
  });

  it('reports unknown persistent ids as missing datasets', async () => {
    const { client } = makeClient();

    const error = (await client.fetchMetadata(REF))._unsafeUnwrapErr();

    expect(error.type).toBe('DatasetNotFound');
  });

  it('lists files under their directory labels', async () => {
    const { client } = makeClient({ [`GET ${DATASET_URL}`]: () => jsonResponse(DATASET) });

    const files = (await client.fetchFiles(REF))._unsafeUnwrap();

    expect(files.map(({ path, size, url }) => ({ path, size, url }))).toEqual([
      { path: 'raw/cores.csv', size: 5, url: `${SERVER}/api/access/datafile/42` },
      { path: 'readme.txt', size: null, url: `${SERVER}/api/access/datafile/43` },
    ]);
  });

  describe('createDraft', () => {
    const NEW_PID = 'doi:10.7910/DVN/NEW';
    const ENCODED_NEW = 'doi%3A10.7910%2FDVN%2FNEW';
    const createUrl = `${SERVER}/api/dataverses/lab/datasets`;
    const addUrl = `${SERVER}/api/datasets/:persistentId/add?persistentId=${ENCODED_NEW}`;
    const publishUrl = `${SERVER}/api/datasets/:persistentId/actions/:publish?persistentId=${ENCODED_NEW}&type=major`;
    const routes: Record<string, FakeRoute> = {
      [`POST ${createUrl}`]: () => jsonResponse({ data: { persistentId: NEW_PID } }, 201),
      [`POST ${addUrl}`]: () => jsonResponse({ status: 'OK' }),
      [`POST ${publishUrl}`]: () => jsonResponse({ status: 'OK' }),
    };

    it('creates the dataset, uploads files and publishes', async () => {
      const { client, requests } = makeClient(routes, 'lab');

      const receipt = (await client.createDraft(makeDraft(), 'test-secret'))._unsafeUnwrap();

      expect(receipt).toEqual({
        id: NEW_PID,
        uri: `${SERVER}/dataset.xhtml?persistentId=${NEW_PID}`,
        published: true,
      });
      expect(requests.map((request) => request.url)).toEqual([createUrl, addUrl, publishUrl]);
      expect(requests.every((request) => request.headers['x-dataverse-key'] === 'test-secret')).toBe(true);

      const upload = requests[1]?.body;
      expect(upload instanceof FormData ? upload.get('jsonData') : null).toBe('{"directoryLabel":"raw"}');
    });

    it('sends the first creator email as the dataset contact', async () => {
      const { client, requests } = makeClient(routes, 'lab');

      await client.createDraft(makeDraft({ publish: false }), 'test-secret');

      const body = requests[0]?.body;
      const text = typeof body === 'string' ? body : '';
      expect(text).toContain('"datasetContactEmail":{"typeName":"datasetContactEmail"');
      expect(text).toContain('"value":"ada@example.com"');
      expect(requests.map((request) => request.url)).toEqual([createUrl, addUrl]);
    });

    it('takes the dataverse from the draft over the client default', async () => {
      const { client, requests } = makeClient(
        { [`POST ${SERVER}/api/dataverses/other/datasets`]: () => jsonResponse({ data: { persistentId: NEW_PID } }) },
        'lab'
      );

      await client.createDraft(makeDraft({ files: [], publish: false, dataverseName: 'other' }), 'test-secret');

      expect(requests.map((request) => request.url)).toEqual([`${SERVER}/api/dataverses/other/datasets`]);
    });

    it('requires a dataverse name', async () => {
      const { client, requests } = makeClient(routes);

      const error = (await client.createDraft(makeDraft(), 'test-secret'))._unsafeUnwrapErr();

      expect(error.type).toBe('InvalidInputError');
      expect(requests).toHaveLength(0);
    });

    it('maps a forbidden answer to an access token error', async () => {
      const { client } = makeClient(
        { [`POST ${createUrl}`]: () => jsonResponse({ status: 'ERROR' }, 403) },
        'lab'
      );

      const error = (await client.createDraft(makeDraft(), 'test-secret'))._unsafeUnwrapErr();

      expect(error).toMatchObject({
        type: 'InvalidAccessTokenError',
        accessTokenUrl: `${SERVER}/dataverseuser.xhtml?selectTab=apiTokenTab`,
      });
    });
  });
});
