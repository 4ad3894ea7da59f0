import {
  GetParameterCommand,
  GetParameterCommandOutput,
  ParameterNotFound,
  ParameterType as SsmParameterType,
  SSMClient,
} from '@aws-sdk/client-ssm';
import { ParameterNotFoundError } from '../errors';
import { OutputValue } from '../types/outputs';
import { buildParameterPath } from './parameter-path';
import { PublishedParameter } from './publish';

/**
 * Where published parameters are read from
 */
export interface ParameterSource {
  /**
   * Resolves to `undefined` when nothing is stored at `path`
   */
  fetch(path: string): Promise<OutputValue | undefined>;
}

/**
 * The part of the SSM client the reader uses
 */
export interface SsmGetParameterClient {
  send(command: GetParameterCommand): Promise<GetParameterCommandOutput>;
}

export interface SsmParameterSourceProps {
  readonly region?: string;
  /**
   * @default a new SSMClient for `region`
   */
  readonly client?: SsmGetParameterClient;
}

/**
 * Reads parameters from AWS Systems Manager Parameter Store
 */
export class SsmParameterSource implements ParameterSource {
  private readonly client: SsmGetParameterClient;

  constructor(props: SsmParameterSourceProps = {}) {
    this.client = props.client ?? new SSMClient({ region: props.region });
  }

  async fetch(path: string): Promise<OutputValue | undefined> {
    let response: GetParameterCommandOutput;
    try {
      response = await this.client.send(new GetParameterCommand({ Name: path, WithDecryption: true }));
    } catch (error) {
      if (error instanceof ParameterNotFound) {
        return undefined;
      }
      throw error;
    }

    const parameter = response.Parameter;
    if (parameter?.Value === undefined) {
      return undefined;
    }
    return parameter.Type === SsmParameterType.STRING_LIST ? parameter.Value.split(',') : parameter.Value;
  }
}

/**
 * Serves parameters straight from publication records, without AWS access
 */
export class InMemoryParameterSource implements ParameterSource {
  private readonly values = new Map<string, OutputValue>();

  constructor(parameters: readonly PublishedParameter[]) {
    for (const parameter of parameters) {
      this.values.set(parameter.path, typeof parameter.value === 'string' ? parameter.value : [...parameter.value]);
    }
  }

  async fetch(path: string): Promise<OutputValue | undefined> {
    return this.values.get(path);
  }
}

/**
 * Runtime lookup of a value published by a stack. Read-only, no caching.
 *
 * @example
 * const reader = new ParameterReader(new SsmParameterSource({ region: 'ap-southeast-2' }));
 * const endpoint = await reader.get('infra', 'dev', 'rds', 'cluster-endpoint');
 */
export class ParameterReader {
  constructor(private readonly source: ParameterSource) {}

  /**
   * @throws ParameterNotFoundError when nothing is published at the rebuilt path
   */
  async get(root: string, environment: string, stack: string, key: string): Promise<OutputValue> {
    const path = buildParameterPath(root, environment, stack, key);
    const value = await this.source.fetch(path);
    if (value === undefined) {
      throw new ParameterNotFoundError(path);
    }
    return value;
  }
}
