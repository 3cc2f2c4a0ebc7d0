import type { AssetIndex, DependencyGraph } from '../graph/DependencyGraph';
import { typeLabelOf, type Asset } from '../inventory/Asset';
import { DomainError } from '../reliability/DomainError';
import { telemetry } from '../telemetry/Telemetry';

/** Which attribute of the root asset is propagated. */
export type PropagationField = 'type' | 'id';

/** Asset id → labels of the asset itself and of everything that transitively depends on it. */
export type DependentLabels = ReadonlyMap<string, ReadonlySet<string>>;

export type PropagationOptions = {
  /** Upper bound on node visits across all roots of one call. */
  maxTraversalSteps?: number;
};

export const DEFAULT_MAX_TRAVERSAL_STEPS = 5_000_000;

const labelOf = (asset: Asset, field: PropagationField): string =>
  field === 'id' ? asset.id : typeLabelOf(asset);

const resolveLimit = (value: number | undefined): number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0
    ? Math.trunc(value)
    : DEFAULT_MAX_TRAVERSAL_STEPS;

/**
 * Propagates each asset's label down its dependency edges.
 *
 * For every root R, `field(R)` is added to R and to every asset R transitively
 * depends on. Hence, for any asset A, the result holds `field(A)` plus
 * `field(X)` for every X that transitively depends on A.
 *
 * - Explicit stack over arena slots (no recursion).
 * - Visited set is per root; cycles terminate, but every root pays for its own walk.
 * - Exceeding `maxTraversalSteps` throws TRAVERSAL_LIMIT_EXCEEDED.
 */
export function propagateDependents(
  graph: Pick<DependencyGraph, 'index'>,
  field: PropagationField,
  options?: PropagationOptions,
): DependentLabels {
  const index: AssetIndex = graph.index;
  const maxSteps = resolveLimit(options?.maxTraversalSteps);

  return telemetry.measure(
    'inventory.propagate',
    { field },
    () => {
      const labels: Array<Set<string>> = index.assets.map(() => new Set<string>());
      let steps = 0;

      for (let root = 0; root < index.assets.length; root += 1) {
        const rootAsset = index.assets[root];
        if (!rootAsset) continue;
        const label = labelOf(rootAsset, field);

        const visited = new Set<number>([root]);
        const stack: number[] = [root];
        while (stack.length > 0) {
          const slot = stack.pop();
          if (slot === undefined) break;

          steps += 1;
          if (steps > maxSteps) {
            throw new DomainError({
              code: 'TRAVERSAL_LIMIT_EXCEEDED',
              message: `Dependent propagation exceeded ${maxSteps} steps.`,
              details: { field, maxTraversalSteps: maxSteps, rootId: rootAsset.id },
            });
          }

          labels[slot]?.add(label);
          for (const next of index.dependencySlots[slot] ?? []) {
            if (visited.has(next)) continue;
            visited.add(next);
            stack.push(next);
          }
        }
      }

      const out = new Map<string, ReadonlySet<string>>();
      index.assets.forEach((asset, slot) => out.set(asset.id, labels[slot] ?? new Set<string>()));
      return out;
    },
    (result) => ({ assetCount: result.size }),
  );
}

/** `dependentTypes`: types of the asset and of everything that transitively depends on it. */
export const propagateDependentTypes = (graph: Pick<DependencyGraph, 'index'>, options?: PropagationOptions) =>
  propagateDependents(graph, 'type', options);

/** `dependentIds`: ids of the asset and of everything that transitively depends on it. */
export const propagateDependentIds = (graph: Pick<DependencyGraph, 'index'>, options?: PropagationOptions) =>
  propagateDependents(graph, 'id', options);
