import { PathCollisionError } from '../errors';
import { PublishedParameter } from './publish';

/**
 * Tracks every parameter path published during one synthesis pass.
 * A stage owns exactly one registry and hands it to each of its stacks.
 */
export class ParameterPathRegistry {
  private readonly owners = new Map<string, string>();

  /**
   * Records `parameters` as published by `owner`. Either every path is recorded
   * or, on the first collision, none is.
   */
  claim(owner: string, parameters: readonly PublishedParameter[]): void {
    for (const { path } of parameters) {
      const existing = this.owners.get(path);
      if (existing !== undefined) {
        throw new PathCollisionError(path, existing, owner);
      }
    }
    for (const { path } of parameters) {
      this.owners.set(path, owner);
    }
  }

  get paths(): string[] {
    return [...this.owners.keys()];
  }

  ownerOf(path: string): string | undefined {
    return this.owners.get(path);
  }
}
