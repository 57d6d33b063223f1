/**
 * Image reference normalisation
 *
 * References are stored in their fully qualified form so that
 * `alpine`, `docker.io/alpine` and `docker.io/library/alpine:latest`
 * resolve to the same `images` row regardless of the registry they were
 * pulled with.
 */

export const DEFAULT_REGISTRY = 'docker.io';
export const DEFAULT_TAG = 'latest';

const LEGACY_DOCKER_HOSTS = new Set(['index.docker.io', 'registry-1.docker.io']);

export interface ImageReference {
  registry: string;
  repository: string;
  tag: string | null;
  digest: string | null;
}

function looksLikeRegistry(segment: string): boolean {
  return segment.includes('.') || segment.includes(':') || segment === 'localhost';
}

/**
 * @throws {Error} If the reference is empty or malformed
 */
export function parseImageReference(input: string): ImageReference {
  const raw = input.trim();
  if (raw === '' || /\s/.test(raw)) {
    throw new Error(`Invalid image reference: "${input}"`);
  }

  let rest = raw;
  let digest: string | null = null;
  const at = rest.indexOf('@');
  if (at !== -1) {
    digest = rest.slice(at + 1);
    rest = rest.slice(0, at);
    if (!/^[a-z0-9]+(?:[+._-][a-z0-9]+)*:[a-fA-F0-9]{32,}$/.test(digest)) {
      throw new Error(`Invalid digest in image reference: "${input}"`);
    }
  }

  let tag: string | null = null;
  const lastSlash = rest.lastIndexOf('/');
  const colon = rest.lastIndexOf(':');
  if (colon > lastSlash) {
    tag = rest.slice(colon + 1);
    rest = rest.slice(0, colon);
    if (!/^[\w][\w.-]{0,127}$/.test(tag)) {
      throw new Error(`Invalid tag in image reference: "${input}"`);
    }
  }

  const segments = rest.split('/');
  let registry = DEFAULT_REGISTRY;
  const first = segments[0] ?? '';
  if (segments.length > 1 && looksLikeRegistry(first)) {
    registry = LEGACY_DOCKER_HOSTS.has(first) ? DEFAULT_REGISTRY : first;
    segments.shift();
  }

  if (segments.length === 0 || segments.some(segment => !/^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/.test(segment))) {
    throw new Error(`Invalid repository in image reference: "${input}"`);
  }
  if (registry === DEFAULT_REGISTRY && segments.length === 1) {
    segments.unshift('library');
  }

  if (tag === null && digest === null) {
    tag = DEFAULT_TAG;
  }

  return { registry, repository: segments.join('/'), tag, digest };
}

export function formatImageReference(reference: ImageReference): string {
  const tag = reference.tag !== null ? `:${reference.tag}` : '';
  const digest = reference.digest !== null ? `@${reference.digest}` : '';
  return `${reference.registry}/${reference.repository}${tag}${digest}`;
}

/**
 * Canonical form used as the `images.reference` key
 */
export function normalizeImageReference(input: string): string {
  return formatImageReference(parseImageReference(input));
}
