import type { AnnotatedAsset } from '../inventory/AnnotatedAsset';
import type { AssetTypeRegistry } from '../inventory/AssetTypeRegistry';
import { resolvePlaceholders, type ResolvedView } from './MissingReferenceResolver';
import { selectSubgraph, type SubgraphSelection } from './SubgraphSelector';

export type InventoryViewKind = 'All' | 'NotLeadingTo' | 'AssetType' | 'Application';

/**
 * Declarative definition of one generated map.
 *
 * A view is a projection over the annotated snapshot: no node payloads, no
 * layout, only the selection that carves it.
 */
export type InventoryView = {
  /** File base name, e.g. `index`, `_unapplied`, `_vm_virtualbox`, `_app_wiki`. */
  readonly name: string;
  readonly kind: InventoryViewKind;
  /** Human description of the subset shown. */
  readonly subset: string;
  readonly selection: SubgraphSelection;
};

export const APPLICATION_TYPE_PATTERN = 'application/.*';

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export const isApplication = (asset: AnnotatedAsset): boolean => (asset.type ?? '').startsWith('application/');

export const viewNameForType = (typeName: string): string => `_${typeName.replace(/\//g, '_')}`;

/** Application views double as file names, so path separators in the id become `_`. */
export const viewNameForApplication = (id: string): string => `_${id.replace(/[/\\]/g, '_')}`;

/**
 * The standard map set:
 * - everything;
 * - assets not leading to an application (closed over their dependencies);
 * - one map per registered type, showing those assets and their dependencies;
 * - one focused map per application.
 */
export function standardViews(
  registry: AssetTypeRegistry,
  assets: readonly AnnotatedAsset[],
  options?: { maxFixpointPasses?: number },
): InventoryView[] {
  const views: InventoryView[] = [
    {
      name: 'index',
      kind: 'All',
      subset: 'All assets',
      selection: { pattern: '.*', field: 'dependentTypes' },
    },
    {
      name: '_unapplied',
      kind: 'NotLeadingTo',
      subset: `Assets not leading to an asset of type ${APPLICATION_TYPE_PATTERN}`,
      selection: {
        pattern: APPLICATION_TYPE_PATTERN,
        field: 'dependentTypes',
        negate: true,
        maxFixpointPasses: options?.maxFixpointPasses,
      },
    },
  ];

  for (const typeName of registry.typeNames()) {
    views.push({
      name: viewNameForType(typeName),
      kind: 'AssetType',
      subset: `${typeName} assets only`,
      selection: { pattern: escapeRegExp(typeName), field: 'dependentTypes' },
    });
  }

  for (const app of assets.filter(isApplication)) {
    views.push({
      name: viewNameForApplication(app.id),
      kind: 'Application',
      subset: `${app.id} assets only`,
      selection: { pattern: escapeRegExp(app.id), field: 'dependentIds' },
    });
  }

  return views;
}

export const findView = (views: readonly InventoryView[], name: string): InventoryView | null =>
  views.find((v) => v.name === name) ?? null;

export type ResolvedInventoryView = {
  view: InventoryView;
  selected: AnnotatedAsset[];
  resolved: ResolvedView;
};

export function resolveInventoryView(view: InventoryView, assets: readonly AnnotatedAsset[]): ResolvedInventoryView {
  const selected = selectSubgraph(assets, view.selection);
  return { view, selected, resolved: resolvePlaceholders(selected) };
}
