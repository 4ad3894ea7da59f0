import { InvalidParameterPathError } from '../errors';

const SEGMENT_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

/**
 * Builds `/{root}/{environment}/{stack}/{key}`.
 *
 * Segments are restricted to lowercase alphanumerics and single hyphens, so no
 * segment can contain a `/` and two distinct tuples never produce the same path.
 * A single leading `/` on the root is tolerated and dropped.
 */
export function buildParameterPath(root: string, environment: string, stack: string, key: string): string {
  const segments: Array<[role: string, segment: string]> = [
    ['root', root.startsWith('/') ? root.substring(1) : root],
    ['environment', environment],
    ['stack', stack],
    ['key', key],
  ];
  for (const [role, segment] of segments) {
    if (!isValidSegment(segment)) {
      throw new InvalidParameterPathError(segment, role);
    }
  }
  return `/${segments.map(([, segment]) => segment).join('/')}`;
}

export function isValidSegment(segment: string): boolean {
  return SEGMENT_PATTERN.test(segment);
}
