import { parseArgs } from 'node:util';
import { InfraError } from '@common/errors';
import { OutputValue } from '@common/types/outputs';
import { ParameterReader, ParameterSource, SsmParameterSource } from '@common/parameter-store/parameter-reader';
import { resolveEnvironment } from 'parameters/environments';

export const GET_PARAMETER_USAGE =
  'Usage: get-parameter --env <dev|staging|prod> --stack <stack> --key <key> [--root <root>] [--region <region>]';

export class UsageError extends InfraError {
  constructor(message: string) {
    super(`${message}\n${GET_PARAMETER_USAGE}`);
    this.name = 'UsageError';
  }
}

export interface GetParameterCommandOptions {
  /**
   * @default an SSM source for the region
   */
  readonly createSource?: (region: string) => ParameterSource;
  /**
   * @default console.log
   */
  readonly write?: (line: string) => void;
}

/**
 * Print the value a stack published, one line per list item.
 * Root and region default to those of the named environment.
 */
export async function runGetParameter(argv: string[], options: GetParameterCommandOptions = {}): Promise<OutputValue> {
  const { values } = parseArgs({
    args: argv,
    options: {
      env: { type: 'string', short: 'e' },
      stack: { type: 'string', short: 's' },
      key: { type: 'string', short: 'k' },
      root: { type: 'string' },
      region: { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  });

  if (!values.env || !values.stack || !values.key) {
    throw new UsageError('--env, --stack and --key are required');
  }

  const params = resolveEnvironment(values.env);
  const region = values.region ?? params.region;
  const createSource = options.createSource ?? ((sourceRegion: string) => new SsmParameterSource({ region: sourceRegion }));
  const reader = new ParameterReader(createSource(region));

  const value = await reader.get(values.root ?? params.parameterRoot, params.environment, values.stack, values.key);

  const write = options.write ?? ((line: string) => console.log(line));
  for (const line of typeof value === 'string' ? [value] : value) {
    write(line);
  }
  return value;
}
