import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok } from 'neverthrow';

import { createDataverseClient } from './dataverse.js';
import { createProjectClient } from './project.js';
import { createZenodoClient } from './zenodo.js';
import { createProviderError } from '../../core/errors.js';

import type { HttpClient } from './http.js';
import type { DoiResolver, ProviderClient, RepositoryPort } from '../../core/ports.js';

export const DEFAULT_DOI_RESOLVER_URL = 'https://doi.org';

const HandleResponseSchema = Type.Object({
  values: Type.Array(
    Type.Object({
      type: Type.String(),
      data: Type.Object({ value: Type.Unknown() }),
    })
  ),
});

const handleValidator = TypeCompiler.Compile(HandleResponseSchema);

/**
 * Looks DOIs up through the handle API of doi.org; unknown DOIs resolve to null.
 */
export const createDoiResolver = (
  http: HttpClient,
  baseUrl: string = DEFAULT_DOI_RESOLVER_URL
): DoiResolver => ({
  async resolve(doi) {
    const url = `${baseUrl.replace(/\/+$/, '')}/api/handles/${doi}`;
    const body = await http.getJson(url);
    if (body.isErr()) {
      if (body.error.type === 'NetworkError' && body.error.status === 404) {
        return ok(null);
      }
      return err(body.error);
    }

    if (!handleValidator.Check(body.value)) {
      return err(createProviderError('doi', `Unexpected handle payload for ${doi}`));
    }

    const target = body.value.values.find((value) => value.type === 'URL')?.data.value;
    return ok(typeof target === 'string' ? target : null);
  },
});

export interface ProviderClientsOptions {
  http: HttpClient;
  repository: RepositoryPort;
  zenodoUrl: string;
  dataverseServerUrl?: string | undefined;
  dataverseName?: string | undefined;
  metadataDir?: string | undefined;
}

/**
 * Clients in matching order: catalog providers before project URLs.
 */
export const createProviderClients = (options: ProviderClientsOptions): ProviderClient[] => [
  createZenodoClient({ http: options.http, baseUrl: options.zenodoUrl }),
  createDataverseClient({
    http: options.http,
    serverUrl: options.dataverseServerUrl,
    dataverseName: options.dataverseName,
  }),
  createProjectClient({ repository: options.repository, metadataDir: options.metadataDir }),
];
