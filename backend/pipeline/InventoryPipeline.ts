import { propagateDependentIds, propagateDependentTypes } from '../analysis/DependentPropagation';
import { AssetValidationEngine } from '../governance/AssetValidationEngine';
import type { RuleSet } from '../governance/RuleSet';
import { createStandardRuleSet } from '../governance/StandardAssetRules';
import { buildDependencyGraph, type DependencyGraph } from '../graph/DependencyGraph';
import type { AssetDocument } from '../interoperability/yaml/AssetYamlLoader';
import { annotateAssets, annotateDetached, type AnnotatedAsset } from '../inventory/AnnotatedAsset';
import { isArchived, type Asset } from '../inventory/Asset';
import type { AssetTypeRegistry } from '../inventory/AssetTypeRegistry';
import { telemetry } from '../telemetry/Telemetry';
import type { IssueReport } from '../validation/IssueReport';

export type InventoryLimits = {
  maxTraversalSteps?: number;
};

export type InventoryPipelineInput = {
  /** Loaded asset files, in command-line order. */
  documents?: readonly AssetDocument[];
  /** Records supplied directly (appended after `documents`). */
  assets?: readonly Asset[];
  registry: AssetTypeRegistry;
  /** Defaults to the standard rules over `registry`. */
  ruleSet?: RuleSet;
  /** Fixed "updated" stamp for reproducible output; defaults to now. */
  updated?: string;
  limits?: InventoryLimits;
};

/**
 * Read-only result of one run.
 *
 * `assets` are the active (non-archived) records, annotated; `archived` are
 * kept for listing only and take no part in the graph.
 */
export type InventorySnapshot = {
  readonly title: string;
  readonly generated: string;
  readonly registry: AssetTypeRegistry;
  readonly assets: readonly AnnotatedAsset[];
  readonly archived: readonly AnnotatedAsset[];
  readonly lookup: ReadonlyMap<string, AnnotatedAsset>;
  readonly graph: DependencyGraph;
  readonly issues: IssueReport;
};

/** Title from the first file with a `general.title`, plus the update stamp. */
export const inventoryTitle = (assets: readonly Asset[], updated: string): string => {
  const withTitle = assets.find((a) => a.source.title !== undefined);
  return `${withTitle?.source.title ?? ''} updated ${updated}`;
};

/**
 * Runs the core in order: build graph → validate → propagate → annotate.
 *
 * Throws DUPLICATE_IDENTIFIER before any validation when ids repeat.
 */
export function runInventoryPipeline(input: InventoryPipelineInput): InventorySnapshot {
  const all: Asset[] = [...(input.documents ?? []).flatMap((d) => d.assets), ...(input.assets ?? [])];
  const active = all.filter((a) => !isArchived(a));
  const archived = all.filter(isArchived);

  return telemetry.measure(
    'inventory.pipeline',
    {},
    () => {
      const graph = buildDependencyGraph(active);

      const engine = new AssetValidationEngine({
        ruleSet: input.ruleSet ?? createStandardRuleSet(input.registry),
        registry: input.registry,
      });
      const issues = engine.validate({ assets: active, graph });

      const options = { maxTraversalSteps: input.limits?.maxTraversalSteps };
      const assets = annotateAssets(active, graph, {
        dependentTypes: propagateDependentTypes(graph, options),
        dependentIds: propagateDependentIds(graph, options),
      });

      const updated = input.updated ?? new Date().toISOString();

      return {
        title: inventoryTitle(all, updated),
        generated: updated,
        registry: input.registry,
        assets,
        archived: annotateDetached(archived),
        lookup: new Map(assets.map((a) => [a.id, a] as const)),
        graph,
        issues,
      };
    },
    (snapshot) => ({
      assetCount: snapshot.assets.length,
      archivedCount: snapshot.archived.length,
      assetsWithIssues: snapshot.issues.size,
    }),
  );
}
