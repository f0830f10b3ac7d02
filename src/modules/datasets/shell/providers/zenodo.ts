/**
 * Zenodo: records API for import, depositions API for export.
 */

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { mapProviderStatus } from './errors.js';
import { readExportFile, readJson, type HttpClient } from './http.js';
import {
  createProviderError,
  formatSchemaErrors,
  type DatasetError,
} from '../../core/errors.js';

import type {
  DraftReceipt,
  ExportDraft,
  ProviderClient,
  ProviderFileHandle,
} from '../../core/ports.js';
import type { ProviderDatasetRecord, ProviderRef } from '../../core/types.js';

const ZenodoRecordSchema = Type.Object({
  id: Type.Union([Type.Number(), Type.String()]),
  doi: Type.Optional(Type.String()),
  metadata: Type.Object({
    title: Type.String(),
    description: Type.Optional(Type.String()),
    creators: Type.Optional(
      Type.Array(
        Type.Object({
          name: Type.String(),
          affiliation: Type.Optional(Type.Union([Type.String(), Type.Null()])),
        })
      )
    ),
    keywords: Type.Optional(Type.Array(Type.String())),
    license: Type.Optional(Type.Union([Type.Object({ id: Type.String() }), Type.String()])),
    language: Type.Optional(Type.String()),
    publication_date: Type.Optional(Type.String()),
    version: Type.Optional(Type.String()),
  }),
  files: Type.Optional(
    Type.Array(
      Type.Object({
        key: Type.String(),
        size: Type.Optional(Type.Number()),
      })
    )
  ),
});

const DepositionSchema = Type.Object({
  id: Type.Union([Type.Number(), Type.String()]),
  links: Type.Object({ bucket: Type.String() }),
});

type ZenodoRecord = Static<typeof ZenodoRecordSchema>;

const recordValidator = TypeCompiler.Compile(ZenodoRecordSchema);
const depositionValidator = TypeCompiler.Compile(DepositionSchema);

const DOI_RE = /^(?:doi:|https?:\/\/(?:dx\.)?doi\.org\/)?10\.5281\/zenodo\.(\d+)$/i;
const URL_RE = /^https?:\/\/(?:sandbox\.)?zenodo\.org\/(?:records?|deposit|uploads)\/(\d+)\/?(?:[?#].*)?$/i;

export interface ZenodoClientOptions {
  http: HttpClient;
  /** e.g. https://zenodo.org */
  baseUrl: string;
}

export const createZenodoClient = (options: ZenodoClientOptions): ProviderClient => {
  const { http } = options;
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const baseHost = new URL(baseUrl).host;
  const accessTokenUrl = `${baseUrl}/account/settings/applications/tokens/new/`;

  const refFor = (id: string): ProviderRef => ({
    provider: 'zenodo',
    uri: `${baseUrl}/records/${id}`,
    id,
  });

  const fetchRecord = async (
    url: string,
    identifier: string
  ): Promise<Result<ZenodoRecord, DatasetError>> => {
    const body = await http.getJson(url);
    if (body.isErr()) {
      return err(mapProviderStatus(body.error, { provider: 'zenodo', identifier }));
    }
    if (!recordValidator.Check(body.value)) {
      return err(
        createProviderError(
          'zenodo',
          `Unexpected record payload from ${url}: ${formatSchemaErrors(recordValidator.Errors(body.value)).join('; ')}`
        )
      );
    }
    return ok(body.value);
  };

  const toRecord = (record: ZenodoRecord): ProviderDatasetRecord => {
    const { metadata } = record;
    const license = metadata.license;
    return {
      ref: refFor(String(record.id)),
      title: metadata.title,
      description: metadata.description ?? '',
      creators: (metadata.creators ?? []).map((creator) => ({
        name: creator.name,
        email: null,
        affiliation: creator.affiliation ?? null,
      })),
      keywords: metadata.keywords ?? [],
      license: license === undefined ? null : typeof license === 'string' ? license : license.id,
      language: metadata.language ?? null,
      datePublished: metadata.publication_date ?? null,
      version: metadata.version ?? null,
    };
  };

  const withAuth = (token: string): Record<string, string> => ({ Authorization: `Bearer ${token}` });

  const authError = (error: DatasetError): DatasetError =>
    mapProviderStatus(error, { provider: 'zenodo', accessTokenUrl });

  return {
    name: 'zenodo',
    versioned: true,
    exportable: true,

    parseUri(uri) {
      const trimmed = uri.trim();
      const doi = DOI_RE.exec(trimmed);
      if (doi?.[1] !== undefined) {
        return refFor(doi[1]);
      }
      const url = URL_RE.exec(trimmed);
      if (url?.[1] !== undefined) {
        return refFor(url[1]);
      }
      if (trimmed.startsWith('http')) {
        try {
          const parsed = new URL(trimmed);
          const match = /^\/records?\/(\d+)\/?$/.exec(parsed.pathname);
          if (parsed.host === baseHost && match?.[1] !== undefined) {
            return refFor(match[1]);
          }
        } catch {
          return null;
        }
      }
      return null;
    },

    async fetchMetadata(ref, fetchOptions = {}) {
      const url =
        fetchOptions.latest === true
          ? `${baseUrl}/api/records/${ref.id}/versions/latest`
          : `${baseUrl}/api/records/${ref.id}`;
      const record = await fetchRecord(url, ref.uri);
      return record.map(toRecord);
    },

    async fetchFiles(ref): Promise<Result<ProviderFileHandle[], DatasetError>> {
      const record = await fetchRecord(`${baseUrl}/api/records/${ref.id}`, ref.uri);
      if (record.isErr()) {
        return err(record.error);
      }

      return ok(
        (record.value.files ?? []).map((file) => {
          const url = `${baseUrl}/api/records/${ref.id}/files/${encodeURIComponent(file.key)}/content`;
          return {
            path: file.key,
            size: file.size ?? null,
            url,
            open: () => http.open(url),
          };
        })
      );
    },

    async createDraft(draft: ExportDraft, token: string): Promise<Result<DraftReceipt, DatasetError>> {
      const created = await http.send(`${baseUrl}/api/deposit/depositions`, {
        method: 'POST',
        headers: { ...withAuth(token), 'Content-Type': 'application/json' },
        body: JSON.stringify({
          metadata: {
            title: draft.title,
            upload_type: 'dataset',
            description: draft.description !== '' ? draft.description : draft.title,
            creators: draft.creators.map((creator) => ({
              name: creator.name,
              ...(creator.affiliation !== null ? { affiliation: creator.affiliation } : {}),
            })),
            keywords: draft.keywords,
            version: draft.version,
            ...(draft.license !== null ? { license: draft.license } : {}),
            ...(draft.language !== null ? { language: draft.language } : {}),
          },
        }),
      });
      if (created.isErr()) {
        return err(authError(created.error));
      }

      const body = await readJson(`${baseUrl}/api/deposit/depositions`, created.value);
      if (body.isErr()) {
        return err(body.error);
      }
      const deposition = body.value;
      if (!depositionValidator.Check(deposition)) {
        return err(createProviderError('zenodo', 'Deposition response has no bucket link'));
      }
      const id = String(deposition.id);

      for (const file of draft.files) {
        const bytes = await readExportFile(file);
        if (bytes.isErr()) {
          return err(bytes.error);
        }
        const uploaded = await http.send(
          `${deposition.links.bucket}/${encodeURIComponent(file.path)}`,
          {
            method: 'PUT',
            headers: { ...withAuth(token), 'Content-Type': 'application/octet-stream' },
            body: bytes.value,
          }
        );
        if (uploaded.isErr()) {
          return err(authError(uploaded.error));
        }
      }

      if (!draft.publish) {
        return ok({ id, uri: null, published: false });
      }

      const published = await http.send(
        `${baseUrl}/api/deposit/depositions/${id}/actions/publish`,
        { method: 'POST', headers: withAuth(token) }
      );
      if (published.isErr()) {
        return err(authError(published.error));
      }

      return ok({ id, uri: refFor(id).uri, published: true });
    },

    accessTokenUrl: () => accessTokenUrl,
  };
};
