export const C_RESOURCE = 'Resource';

/**
 * Tags applied to every resource of a stage
 */
export interface CommonTags extends Readonly<Record<string, string>> {
  readonly Environment: string;
  readonly Project: string;
  readonly ManagedBy: string;
}
