import {
  createDatasetNotFoundError,
  createInvalidAccessTokenError,
  type DatasetError,
} from '../../core/errors.js';

import type { ProviderName } from '../../core/types.js';

/**
 * Translates HTTP statuses with a domain meaning: 404 on a record lookup is
 * a missing dataset, 401/403 a missing or rejected token.
 */
export const mapProviderStatus = (
  error: DatasetError,
  context: { provider: ProviderName; identifier?: string; accessTokenUrl?: string }
): DatasetError => {
  if (error.type !== 'NetworkError' || error.status === undefined) {
    return error;
  }
  if (error.status === 404 && context.identifier !== undefined) {
    return createDatasetNotFoundError(context.identifier);
  }
  if ((error.status === 401 || error.status === 403) && context.accessTokenUrl !== undefined) {
    return createInvalidAccessTokenError(context.provider, context.accessTokenUrl);
  }
  return error;
};
