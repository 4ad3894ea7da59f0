import { MissingDependencyError } from '../errors';
import { DependencySet, OutputValue } from '../types/outputs';

/**
 * Typed access to the outputs a stack received from one upstream stack.
 *
 * Construction fails when any required key is absent or empty, so stacks create
 * their resolvers before calling `super()` and nothing is attached to the
 * construct tree on failure.
 */
export class DependencyResolver<K extends string> {
  private constructor(
    private readonly upstream: string,
    private readonly values: DependencySet<K> | undefined,
  ) {}

  static resolve<K extends string>(
    stack: string,
    upstream: string,
    dependencies: DependencySet<K> | undefined,
    required: readonly K[],
  ): DependencyResolver<K> {
    const missing = required.filter((key) => isEmpty(dependencies?.[key]));
    if (missing.length > 0) {
      throw new MissingDependencyError(stack, upstream, missing);
    }
    return new DependencyResolver(upstream, dependencies);
  }

  string(key: K): string {
    const value = this.values?.[key];
    if (typeof value !== 'string') {
      throw new TypeError(`Output "${key}" of "${this.upstream}" is not a single value`);
    }
    return value;
  }

  list(key: K): string[] {
    const value = this.values?.[key];
    if (!Array.isArray(value)) {
      throw new TypeError(`Output "${key}" of "${this.upstream}" is not a list`);
    }
    return [...value];
  }
}

function isEmpty(value: OutputValue | undefined): boolean {
  return value === undefined || value.length === 0;
}
