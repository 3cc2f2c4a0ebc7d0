import { dependentsOf, type DependencyGraph } from '../graph/DependencyGraph';

export type DependentTiers = {
  /** Assets listing this one in `depends_on`. */
  direct: string[];
  /** Transitive dependents that are neither direct nor final. */
  intermediate: string[];
  /** Transitive dependents nothing else depends on (the end of each chain). */
  final: string[];
};

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Classifies everything that depends on `assetId`.
 *
 * Breadth-first over the dependents map; ids missing from `lookup` are walked
 * but left out of the result lists. A direct dependent with no dependents of
 * its own is listed as both direct and final.
 */
export function classifyDependents(
  assetId: string,
  graph: Pick<DependencyGraph, 'lookup' | 'dependents'>,
): DependentTiers {
  const direct = dependentsOf(graph, assetId);
  const all = new Set<string>();
  const finals = new Set<string>();
  const queued = new Set<string>(direct);
  const queue = [...direct];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    all.add(id);
    if (!graph.lookup.has(id)) continue;

    const next = dependentsOf(graph, id);
    if (next.length === 0) finals.add(id);
    for (const n of next) {
      if (queued.has(n)) continue;
      queued.add(n);
      queue.push(n);
    }
  }

  const directSet = new Set(direct);
  const existing = (ids: Iterable<string>) =>
    Array.from(new Set(ids))
      .filter((id) => graph.lookup.has(id))
      .sort(compareStrings);

  return {
    direct: existing(direct),
    intermediate: existing(Array.from(all).filter((id) => !directSet.has(id) && !finals.has(id))),
    final: existing(finals),
  };
}
