import { parseDependencies } from '../inventory/DependencyExpression';
import type { AnnotatedAsset } from '../inventory/AnnotatedAsset';

export const PLACEHOLDER_NAME = '???';

export type ViewNode =
  | { kind: 'asset'; nodeId: string; id: string; name: string; asset: AnnotatedAsset }
  | { kind: 'placeholder'; nodeId: string; id: string; name: string };

/** Directed from the dependency to the asset that depends on it. */
export type ViewEdge = {
  fromNodeId: string;
  toNodeId: string;
  dependencyId: string;
  dependentId: string;
  commentary: string;
  insufficient: boolean;
};

export type ResolvedView = {
  readonly nodes: readonly ViewNode[];
  readonly edges: readonly ViewEdge[];
  readonly nodeById: ReadonlyMap<string, ViewNode>;
  readonly placeholderIds: readonly string[];
};

/**
 * Resolves a selected subset into render-ready nodes and edges.
 *
 * - Subset assets get node ids `n0…n(k-1)` in subset order.
 * - Each dependency id with no asset in the subset gets one placeholder node,
 *   numbered after the assets in first-reference order.
 * - `^` exclusions are not edges and never produce placeholders.
 */
export function resolvePlaceholders(subset: readonly AnnotatedAsset[]): ResolvedView {
  const nodeById = new Map<string, ViewNode>();
  const nodes: ViewNode[] = [];

  for (const asset of subset) {
    if (nodeById.has(asset.id)) continue;
    const node: ViewNode = { kind: 'asset', nodeId: `n${nodes.length}`, id: asset.id, name: asset.name, asset };
    nodeById.set(asset.id, node);
    nodes.push(node);
  }

  const placeholderIds: string[] = [];
  const edges: ViewEdge[] = [];

  for (const asset of subset) {
    const dependent = nodeById.get(asset.id);
    if (!dependent) continue;

    for (const dep of parseDependencies(asset)) {
      if (dep.excluded) continue;

      let target = nodeById.get(dep.id);
      if (!target) {
        target = { kind: 'placeholder', nodeId: `n${nodes.length}`, id: dep.id, name: PLACEHOLDER_NAME };
        nodeById.set(dep.id, target);
        nodes.push(target);
        placeholderIds.push(dep.id);
      }

      edges.push({
        fromNodeId: target.nodeId,
        toNodeId: dependent.nodeId,
        dependencyId: dep.id,
        dependentId: asset.id,
        commentary: dep.commentary,
        insufficient: dep.insufficient,
      });
    }
  }

  return { nodes, edges, nodeById, placeholderIds };
}
