import * as fs from 'fs';
import { z } from 'zod';

const cdkJsonSchema = z.object({
  context: z.record(z.unknown()).default({}),
});

/**
 * Context block of a workspace cdk.json, so tests synthesize with the same
 * context values as `cdk synth`
 */
export function loadCdkContext(cdkJsonPath: string): Record<string, unknown> {
  const cdkJson: unknown = JSON.parse(fs.readFileSync(cdkJsonPath, 'utf8'));
  return cdkJsonSchema.parse(cdkJson).context;
}
