/**
 * Creator grammar: `Forename Surname <email> [affiliation]`.
 * Email and affiliation are optional.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidInputError, type InvalidInputError } from './errors.js';

import type { Creator } from './types.js';

const CREATOR_RE = /^\s*([^<>[\]]+?)\s*(?:<([^>]*)>)?\s*(?:\[([^\]]*)\])?\s*$/;
const EMAIL_RE = /^[^@\s<>]+@[^@\s<>]+\.[^@\s<>]+$/;

export interface ParsedCreators {
  creators: Creator[];
  /** Inputs whose email was missing or malformed */
  noEmailWarnings: string[];
}

export const isValidEmail = (value: string): boolean => EMAIL_RE.test(value);

/**
 * Parses one creator string. A malformed email is dropped (set to null)
 * rather than rejected; only a missing name is an error.
 */
export const parseCreator = (value: string): Result<Creator, InvalidInputError> => {
  const match = CREATOR_RE.exec(value);
  const name = match?.[1]?.trim() ?? '';

  if (match === null || name === '') {
    return err(
      createInvalidInputError(
        'creators',
        `Invalid creator '${value}'. Expected 'Forename Surname <email> [affiliation]'`
      )
    );
  }

  const email = match[2]?.trim() ?? '';
  const affiliation = match[3]?.trim() ?? '';

  return ok({
    name,
    email: isValidEmail(email) ? email : null,
    affiliation: affiliation !== '' ? affiliation : null,
  });
};

export const parseCreators = (
  values: readonly string[]
): Result<ParsedCreators, InvalidInputError> => {
  const creators: Creator[] = [];
  const noEmailWarnings: string[] = [];

  for (const value of values) {
    const parsed = parseCreator(value);
    if (parsed.isErr()) {
      return err(parsed.error);
    }
    if (parsed.value.email === null) {
      noEmailWarnings.push(value);
    }
    creators.push(parsed.value);
  }

  return ok({ creators, noEmailWarnings });
};

export const formatCreator = (creator: Creator): string => {
  let formatted = creator.name;
  if (creator.email !== null) {
    formatted += ` <${creator.email}>`;
  }
  if (creator.affiliation !== null) {
    formatted += ` [${creator.affiliation}]`;
  }
  return formatted;
};

/**
 * True when any creator matches a filter entry by name or email (case-insensitive).
 * An empty filter matches everything.
 */
export const creatorsIntersect = (creators: readonly Creator[], filter: readonly string[]): boolean => {
  if (filter.length === 0) {
    return true;
  }

  const wanted = new Set(filter.map((entry) => entry.trim().toLowerCase()));
  return creators.some(
    (creator) =>
      wanted.has(creator.name.toLowerCase()) ||
      (creator.email !== null && wanted.has(creator.email.toLowerCase()))
  );
};
