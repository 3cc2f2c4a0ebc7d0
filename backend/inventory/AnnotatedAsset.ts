import type { DependentLabels } from '../analysis/DependentPropagation';
import { dependentsOf, type DependencyGraph } from '../graph/DependencyGraph';
import type { Asset } from './Asset';

/**
 * Asset plus the facts derived for one run.
 *
 * Built as a new object; the source record is left as loaded.
 */
export type AnnotatedAsset = Asset & {
  /** Ids of assets that list this one directly in `depends_on`. */
  readonly dependents: readonly string[];
  readonly dependentTypes: ReadonlySet<string>;
  readonly dependentIds: ReadonlySet<string>;
};

/** Annotation fields holding label sets; the selectors key views on these. */
export type LabelField = 'dependentTypes' | 'dependentIds';

const EMPTY: ReadonlySet<string> = new Set<string>();

export const annotateAssets = (
  assets: readonly Asset[],
  graph: Pick<DependencyGraph, 'dependents'>,
  labels: { dependentTypes: DependentLabels; dependentIds: DependentLabels },
): AnnotatedAsset[] =>
  assets.map((asset) => ({
    ...asset,
    dependents: dependentsOf(graph, asset.id),
    dependentTypes: labels.dependentTypes.get(asset.id) ?? EMPTY,
    dependentIds: labels.dependentIds.get(asset.id) ?? EMPTY,
  }));

/** Archived assets take no part in validation or propagation; they carry empty annotations. */
export const annotateDetached = (assets: readonly Asset[]): AnnotatedAsset[] =>
  assets.map((asset) => ({ ...asset, dependents: [], dependentTypes: EMPTY, dependentIds: EMPTY }));
