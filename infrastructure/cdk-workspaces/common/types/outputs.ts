/**
 * A value a stack hands to its dependents: a scalar identifier or a list of them.
 * Values are usually CDK tokens until synthesis.
 */
export type OutputValue = string | string[];

/**
 * Named outputs of one stack, keyed by lowercase-hyphenated resource key
 */
export type OutputSet = Readonly<Record<string, OutputValue>>;

/**
 * The subset of one upstream stack's outputs that a dependent stack reads
 */
export type DependencySet<K extends string> = Readonly<Partial<Record<K, OutputValue>>>;
