import type { Asset } from './Asset';

export const EXCLUSION_MARKER = '^';
export const INSUFFICIENT_MARKER = 'INSUF';

/**
 * One `depends_on` entry: `<id> [free-text commentary]`.
 *
 * - `excluded`: the id starts with `^`, i.e. the entry names a required
 *   dependency pattern the asset deliberately goes without.
 * - `insufficient`: the entry contains `INSUF`; the edge exists but does not
 *   satisfy a required dependency type.
 */
export type DependencyExpression = {
  raw: string;
  id: string;
  commentary: string;
  excluded: boolean;
  insufficient: boolean;
};

export const parseDependencyExpression = (raw: string): DependencyExpression => {
  const tokens = raw.trim().split(/\s+/);
  const id = tokens[0] ?? '';
  return {
    raw,
    id,
    commentary: tokens.slice(1).join(' '),
    excluded: id.startsWith(EXCLUSION_MARKER),
    insufficient: raw.includes(INSUFFICIENT_MARKER),
  };
};

export const parseDependencies = (asset: Asset): DependencyExpression[] =>
  asset.dependsOn.map(parseDependencyExpression).filter((d) => d.id.length > 0);

/**
 * Dependency ids in declaration order, `^` entries included.
 *
 * `sufficientOnly` drops `INSUF` entries (required-dependency-type checks).
 */
export const dependencyIds = (asset: Asset, options?: { sufficientOnly?: boolean }): string[] =>
  parseDependencies(asset)
    .filter((d) => !options?.sufficientOnly || !d.insufficient)
    .map((d) => d.id);

/** Dependency ids that are real edges (no `^` exclusions). */
export const edgeDependencyIds = (asset: Asset): string[] =>
  parseDependencies(asset)
    .filter((d) => !d.excluded)
    .map((d) => d.id);

export const exclusionFor = (pattern: string): string => `${EXCLUSION_MARKER}${pattern}`;
