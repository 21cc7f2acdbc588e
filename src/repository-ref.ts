import type { RepositoryReference } from './types';

export type ParsedRepository =
  | { ok: true; reference: RepositoryReference }
  | { ok: false };

/**
 * Split an "owner/name" identifier. Anything other than exactly one "/" is rejected.
 * Empty segments ("owner/" or "/repo") are accepted as-is.
 */
export function parseRepository(repository: string): ParsedRepository {
  const parts = repository.split('/');
  if (parts.length !== 2) {
    return { ok: false };
  }

  const [owner, name] = parts;
  return { ok: true, reference: { owner, name } };
}

export function formatRepository(reference: RepositoryReference): string {
  return `${reference.owner}/${reference.name}`;
}
