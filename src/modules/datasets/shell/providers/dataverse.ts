/**
 * Dataverse native API.
 *
 * Records are addressed by persistent id (a DOI); the server is taken from
 * the URL when one is given, otherwise from configuration.
 */

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { mapProviderStatus } from './errors.js';
import { readExportFile, readJson, type HttpClient } from './http.js';
import {
  createInvalidInputError,
  createProviderError,
  formatSchemaErrors,
  type DatasetError,
} from '../../core/errors.js';

import type { DraftReceipt, ExportDraft, ProviderClient } from '../../core/ports.js';
import type { Creator, ProviderDatasetRecord, ProviderRef } from '../../core/types.js';

export const DEFAULT_DATAVERSE_SERVER = 'https://dataverse.harvard.edu';

const FieldSchema = Type.Object({
  typeName: Type.String(),
  value: Type.Unknown(),
});

const DatasetResponseSchema = Type.Object({
  data: Type.Object({
    persistentUrl: Type.Optional(Type.String()),
    publicationDate: Type.Optional(Type.String()),
    latestVersion: Type.Object({
      versionNumber: Type.Optional(Type.Number()),
      versionMinorNumber: Type.Optional(Type.Number()),
      license: Type.Optional(Type.Union([Type.String(), Type.Object({ name: Type.String() })])),
      metadataBlocks: Type.Object({
        citation: Type.Object({ fields: Type.Array(FieldSchema) }),
      }),
      files: Type.Optional(
        Type.Array(
          Type.Object({
            label: Type.String(),
            directoryLabel: Type.Optional(Type.String()),
            dataFile: Type.Object({
              id: Type.Number(),
              filesize: Type.Optional(Type.Number()),
            }),
          })
        )
      ),
    }),
  }),
});

const CreatedSchema = Type.Object({
  data: Type.Object({ persistentId: Type.String() }),
});

type DatasetResponse = Static<typeof DatasetResponseSchema>;
type CitationField = Static<typeof FieldSchema>;

const datasetValidator = TypeCompiler.Compile(DatasetResponseSchema);
const createdValidator = TypeCompiler.Compile(CreatedSchema);

const DOI_RE = /^(?:doi:|https?:\/\/(?:dx\.)?doi\.org\/)?(10\.7910\/DVN\/[A-Z0-9]+)$/i;

// ─────────────────────────────────────────────────────────────────────────────
// Citation block helpers
// ─────────────────────────────────────────────────────────────────────────────

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const fieldValue = (fields: readonly CitationField[], name: string): unknown =>
  fields.find((field) => field.typeName === name)?.value;

const stringOf = (value: unknown): string | null => (typeof value === 'string' ? value : null);

/**
 * Reads `sub` from each entry of a compound field, e.g. `author[].authorName.value`.
 */
const compoundValues = (value: unknown, sub: string): (string | null)[] =>
  Array.isArray(value)
    ? value.map((entry) => {
        if (!isRecord(entry)) {
          return null;
        }
        const inner = entry[sub];
        return isRecord(inner) ? stringOf(inner['value']) : null;
      })
    : [];

const toCreators = (fields: readonly CitationField[]): Creator[] => {
  const authors = fieldValue(fields, 'author');
  const names = compoundValues(authors, 'authorName');
  const affiliations = compoundValues(authors, 'authorAffiliation');

  return names.flatMap((name, index) =>
    name === null ? [] : [{ name, email: null, affiliation: affiliations[index] ?? null }]
  );
};

// ─────────────────────────────────────────────────────────────────────────────
// Client
// ─────────────────────────────────────────────────────────────────────────────

export interface DataverseClientOptions {
  http: HttpClient;
  serverUrl?: string | undefined;
  dataverseName?: string | undefined;
}

export const createDataverseClient = (options: DataverseClientOptions): ProviderClient => {
  const { http } = options;
  const defaultServer = (options.serverUrl ?? DEFAULT_DATAVERSE_SERVER).replace(/\/+$/, '');

  const refFor = (server: string, persistentId: string): ProviderRef => ({
    provider: 'dataverse',
    uri: `${server}/dataset.xhtml?persistentId=${persistentId}`,
    id: persistentId,
  });

  const serverOf = (ref: ProviderRef): string => {
    try {
      return new URL(ref.uri).origin;
    } catch {
      return defaultServer;
    }
  };

  const accessTokenUrlFor = (server: string): string =>
    `${server}/dataverseuser.xhtml?selectTab=apiTokenTab`;

  const fetchDataset = async (ref: ProviderRef): Promise<Result<DatasetResponse, DatasetError>> => {
    const url = `${serverOf(ref)}/api/datasets/:persistentId/?persistentId=${encodeURIComponent(ref.id)}`;
    const body = await http.getJson(url);
    if (body.isErr()) {
      return err(mapProviderStatus(body.error, { provider: 'dataverse', identifier: ref.uri }));
    }
    if (!datasetValidator.Check(body.value)) {
      return err(
        createProviderError(
          'dataverse',
          `Unexpected dataset payload from ${url}: ${formatSchemaErrors(datasetValidator.Errors(body.value)).join('; ')}`
        )
      );
    }
    return ok(body.value);
  };

  const citationFields = (draft: ExportDraft): unknown[] => {
    const contactEmail = draft.creators.find((creator) => creator.email !== null)?.email ?? null;
    return [
      { typeName: 'title', typeClass: 'primitive', multiple: false, value: draft.title },
      {
        typeName: 'author',
        typeClass: 'compound',
        multiple: true,
        value: draft.creators.map((creator) => ({
          authorName: { typeName: 'authorName', typeClass: 'primitive', multiple: false, value: creator.name },
          ...(creator.affiliation !== null
            ? {
                authorAffiliation: {
                  typeName: 'authorAffiliation',
                  typeClass: 'primitive',
                  multiple: false,
                  value: creator.affiliation,
                },
              }
            : {}),
        })),
      },
      {
        typeName: 'datasetContact',
        typeClass: 'compound',
        multiple: true,
        value:
          contactEmail === null
            ? []
            : [
                {
                  datasetContactEmail: {
                    typeName: 'datasetContactEmail',
                    typeClass: 'primitive',
                    multiple: false,
                    value: contactEmail,
                  },
                },
              ],
      },
      {
        typeName: 'dsDescription',
        typeClass: 'compound',
        multiple: true,
        value: [
          {
            dsDescriptionValue: {
              typeName: 'dsDescriptionValue',
              typeClass: 'primitive',
              multiple: false,
              value: draft.description !== '' ? draft.description : draft.title,
            },
          },
        ],
      },
      {
        typeName: 'subject',
        typeClass: 'controlledVocabulary',
        multiple: true,
        value: ['Other'],
      },
      {
        typeName: 'keyword',
        typeClass: 'compound',
        multiple: true,
        value: draft.keywords.map((keyword) => ({
          keywordValue: { typeName: 'keywordValue', typeClass: 'primitive', multiple: false, value: keyword },
        })),
      },
    ];
  };

  return {
    name: 'dataverse',
    versioned: true,
    exportable: true,

    parseUri(uri) {
      const trimmed = uri.trim();
      const doi = DOI_RE.exec(trimmed);
      if (doi?.[1] !== undefined) {
        return refFor(defaultServer, `doi:${doi[1]}`);
      }
      if (!/^https?:\/\//i.test(trimmed)) {
        return null;
      }
      try {
        const url = new URL(trimmed);
        const persistentId = url.searchParams.get('persistentId');
        if (url.pathname.endsWith('/dataset.xhtml') && persistentId !== null && persistentId !== '') {
          return refFor(url.origin, persistentId);
        }
      } catch {
        return null;
      }
      return null;
    },

    async fetchMetadata(ref) {
      // The dataset endpoint always answers with the latest version
      const response = await fetchDataset(ref);
      if (response.isErr()) {
        return err(response.error);
      }

      const { data } = response.value;
      const version = data.latestVersion;
      const fields = version.metadataBlocks.citation.fields;
      const license = version.license;
      const description = compoundValues(fieldValue(fields, 'dsDescription'), 'dsDescriptionValue');
      const keywords = compoundValues(fieldValue(fields, 'keyword'), 'keywordValue');

      const record: ProviderDatasetRecord = {
        ref: refFor(serverOf(ref), ref.id),
        title: stringOf(fieldValue(fields, 'title')) ?? ref.id,
        description: description.filter((value): value is string => value !== null).join('\n'),
        creators: toCreators(fields),
        keywords: keywords.filter((value): value is string => value !== null),
        license: license === undefined ? null : typeof license === 'string' ? license : license.name,
        language: null,
        datePublished: data.publicationDate ?? null,
        version:
          version.versionNumber === undefined
            ? null
            : `${String(version.versionNumber)}.${String(version.versionMinorNumber ?? 0)}`,
      };
      return ok(record);
    },

    async fetchFiles(ref) {
      const response = await fetchDataset(ref);
      if (response.isErr()) {
        return err(response.error);
      }

      const server = serverOf(ref);
      return ok(
        (response.value.data.latestVersion.files ?? []).map((file) => {
          const url = `${server}/api/access/datafile/${String(file.dataFile.id)}`;
          return {
            path:
              file.directoryLabel !== undefined && file.directoryLabel !== ''
                ? `${file.directoryLabel}/${file.label}`
                : file.label,
            size: file.dataFile.filesize ?? null,
            url,
            open: () => http.open(url),
          };
        })
      );
    },

    async createDraft(draft, token): Promise<Result<DraftReceipt, DatasetError>> {
      const server = (draft.dataverseServer ?? options.serverUrl)?.replace(/\/+$/, '');
      if (server === undefined || server === '') {
        return err(createInvalidInputError('dataverseServer', 'A Dataverse server URL is required'));
      }
      const dataverseName = draft.dataverseName ?? options.dataverseName;
      if (dataverseName === undefined || dataverseName === '') {
        return err(createInvalidInputError('dataverseName', 'A Dataverse name is required'));
      }

      const headers = { 'X-Dataverse-key': token };
      const authError = (error: DatasetError): DatasetError =>
        mapProviderStatus(error, { provider: 'dataverse', accessTokenUrl: accessTokenUrlFor(server) });

      const createUrl = `${server}/api/dataverses/${encodeURIComponent(dataverseName)}/datasets`;
      const created = await http.send(createUrl, {
        method: 'POST',
        headers: { ...headers, 'Content-Type': 'application/json' },
        body: JSON.stringify({
          datasetVersion: {
            metadataBlocks: {
              citation: { displayName: 'Citation Metadata', fields: citationFields(draft) },
            },
          },
        }),
      });
      if (created.isErr()) {
        return err(authError(created.error));
      }

      const body = await readJson(createUrl, created.value);
      if (body.isErr()) {
        return err(body.error);
      }
      const createdBody = body.value;
      if (!createdValidator.Check(createdBody)) {
        return err(createProviderError('dataverse', 'Dataset creation response has no persistent id'));
      }
      const persistentId = createdBody.data.persistentId;
      const encodedId = encodeURIComponent(persistentId);

      for (const file of draft.files) {
        const bytes = await readExportFile(file);
        if (bytes.isErr()) {
          return err(bytes.error);
        }

        const slash = file.path.lastIndexOf('/');
        const form = new FormData();
        form.append('file', new Blob([bytes.value]), slash === -1 ? file.path : file.path.slice(slash + 1));
        if (slash !== -1) {
          form.append('jsonData', JSON.stringify({ directoryLabel: file.path.slice(0, slash) }));
        }

        const uploaded = await http.send(
          `${server}/api/datasets/:persistentId/add?persistentId=${encodedId}`,
          { method: 'POST', headers, body: form }
        );
        if (uploaded.isErr()) {
          return err(authError(uploaded.error));
        }
      }

      if (draft.publish) {
        const published = await http.send(
          `${server}/api/datasets/:persistentId/actions/:publish?persistentId=${encodedId}&type=major`,
          { method: 'POST', headers }
        );
        if (published.isErr()) {
          return err(authError(published.error));
        }
      }

      return ok({
        id: persistentId,
        uri: refFor(server, persistentId).uri,
        published: draft.publish,
      });
    },

    accessTokenUrl: () => accessTokenUrlFor(defaultServer),
  };
};
