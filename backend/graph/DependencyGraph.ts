import type { Asset } from '../inventory/Asset';
import { dependencyIds } from '../inventory/DependencyExpression';
import { DomainError } from '../reliability/DomainError';
import { telemetry } from '../telemetry/Telemetry';

export type AssetLookup = ReadonlyMap<string, Asset>;

/** Dependency id → ids of the assets that list it, in input order. */
export type DependentsMap = ReadonlyMap<string, readonly string[]>;

export type DuplicateIdentifier = {
  id: string;
  firstSeenIn: string;
  duplicatedIn: string;
};

/**
 * Arena view of the graph: assets addressed by a stable integer slot, with
 * forward edges (asset → its resolvable dependencies) pre-resolved.
 */
export type AssetIndex = {
  readonly assets: readonly Asset[];
  readonly slotById: ReadonlyMap<string, number>;
  /** For slot i, the slots of the assets that asset i depends on (unresolvable ids dropped). */
  readonly dependencySlots: ReadonlyArray<readonly number[]>;
};

export type DependencyGraph = {
  readonly lookup: AssetLookup;
  readonly dependents: DependentsMap;
  readonly index: AssetIndex;
};

export const buildAssetIndex = (assets: readonly Asset[], lookup: AssetLookup): AssetIndex => {
  const slotById = new Map<string, number>();
  const indexed: Asset[] = [];
  for (const asset of assets) {
    if (slotById.has(asset.id) || lookup.get(asset.id) !== asset) continue;
    slotById.set(asset.id, indexed.length);
    indexed.push(asset);
  }

  const dependencySlots = indexed.map((asset) => {
    const slots: number[] = [];
    for (const id of dependencyIds(asset)) {
      const slot = slotById.get(id);
      if (slot !== undefined) slots.push(slot);
    }
    return slots;
  });

  return { assets: indexed, slotById, dependencySlots };
};

const formatDuplicates = (duplicates: readonly DuplicateIdentifier[]): string =>
  duplicates
    .map((d) => `${d.id} (first used in ${d.firstSeenIn}, duplicated in ${d.duplicatedIn})`)
    .join('; ');

/**
 * Builds id → asset and id → dependents mappings.
 *
 * Throws DUPLICATE_IDENTIFIER after scanning every asset when any id repeats;
 * identity-keyed stages cannot run on an ambiguous inventory.
 */
export function buildDependencyGraph(assets: readonly Asset[]): DependencyGraph {
  const startedAtMs = telemetry.nowMs();

  const lookup = new Map<string, Asset>();
  const dependents = new Map<string, string[]>();
  const duplicates: DuplicateIdentifier[] = [];

  for (const asset of assets) {
    const seen = lookup.get(asset.id);
    if (seen) {
      duplicates.push({
        id: asset.id,
        firstSeenIn: seen.source.filePath,
        duplicatedIn: asset.source.filePath,
      });
    } else {
      lookup.set(asset.id, asset);
    }

    for (const dep of dependencyIds(asset)) {
      const list = dependents.get(dep);
      if (list) list.push(asset.id);
      else dependents.set(dep, [asset.id]);
    }
  }

  if (duplicates.length > 0) {
    telemetry.record({
      name: 'graph.build',
      durationMs: telemetry.nowMs() - startedAtMs,
      tags: { failed: true, code: 'DUPLICATE_IDENTIFIER' },
      metrics: { assetCount: assets.length, duplicateCount: duplicates.length },
    });
    throw new DomainError({
      code: 'DUPLICATE_IDENTIFIER',
      message: `Can't continue with duplicate IDs present: ${formatDuplicates(duplicates)}`,
      details: { duplicates },
    });
  }

  const index = buildAssetIndex(assets, lookup);

  telemetry.record({
    name: 'graph.build',
    durationMs: telemetry.nowMs() - startedAtMs,
    tags: { failed: false },
    metrics: { assetCount: assets.length, dependencyKeyCount: dependents.size },
  });

  return { lookup, dependents, index };
}

export const dependentsOf = (graph: Pick<DependencyGraph, 'dependents'>, id: string): readonly string[] =>
  graph.dependents.get(id) ?? [];
