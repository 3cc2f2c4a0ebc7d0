import { classifyDependents } from '../../analysis/DependentTiers';
import { exportAsset } from '../../interoperability/SnapshotExport';
import { hasTag } from '../../inventory/Asset';
import type { InventorySnapshot } from '../../pipeline/InventoryPipeline';
import { DomainError } from '../../reliability/DomainError';
import { renderDot } from '../../rendering/DotRenderer';
import { themeByName, type DotThemeName } from '../../rendering/DotTheme';
import { findView, resolveInventoryView, standardViews, type InventoryView } from '../../views/StandardViews';
import type {
  AssetDetail,
  AssetFilter,
  InventorySummary,
  IssueRow,
  ViewDetail,
  ViewSummary,
} from './inventory.types';

type InventoryState = {
  snapshot: InventorySnapshot;
  theme: DotThemeName;
  maxFixpointPasses?: number;
  views: InventoryView[];
};

let current: InventoryState | null = null;

export function setInventorySnapshot(
  snapshot: InventorySnapshot,
  options?: { theme?: DotThemeName; maxFixpointPasses?: number },
): void {
  current = {
    snapshot,
    theme: options?.theme ?? 'light',
    maxFixpointPasses: options?.maxFixpointPasses,
    views: standardViews(snapshot.registry, snapshot.assets, { maxFixpointPasses: options?.maxFixpointPasses }),
  };
}

export function clearInventorySnapshot(): void {
  current = null;
}

const requireState = (): InventoryState => {
  if (!current) {
    throw new DomainError({ code: 'NOT_FOUND', message: 'No inventory loaded.' });
  }
  return current;
};

export function getInventorySummary(): InventorySummary {
  const { snapshot } = requireState();
  return {
    title: snapshot.title,
    generated: snapshot.generated,
    assetCount: snapshot.assets.length,
    archivedCount: snapshot.archived.length,
    issueCounts: snapshot.issues.counts(),
    assetsWithIssues: snapshot.issues.size,
    types: snapshot.registry.typeNames(),
  };
}

export function listAssets(filter: AssetFilter = {}) {
  const { snapshot } = requireState();
  const pool = filter.includeArchived ? [...snapshot.assets, ...snapshot.archived] : snapshot.assets;

  return pool
    .filter((a) => !filter.type || a.type === filter.type)
    .filter((a) => !filter.tag || hasTag(a, filter.tag))
    .filter((a) => !filter.severity || snapshot.issues.issuesFor(a.id).some((i) => i.severity === filter.severity))
    .map((a) => exportAsset(a, snapshot));
}

export function getAssetDetail(assetId: string): AssetDetail {
  const { snapshot } = requireState();
  const active = snapshot.lookup.get(assetId);
  if (active) {
    return { asset: exportAsset(active, snapshot), archived: false, tiers: classifyDependents(assetId, snapshot.graph) };
  }

  const archived = snapshot.archived.find((a) => a.id === assetId);
  if (archived) {
    return { asset: exportAsset(archived, snapshot), archived: true, tiers: { direct: [], intermediate: [], final: [] } };
  }

  throw new DomainError({
    code: 'NOT_FOUND',
    message: `Asset not found: ${assetId}`,
    details: { assetId },
  });
}

export function listIssues(filter: Pick<AssetFilter, 'severity'> = {}): IssueRow[] {
  const { snapshot } = requireState();
  const rows: IssueRow[] = [];
  for (const asset of snapshot.assets) {
    for (const i of snapshot.issues.issuesFor(asset.id)) {
      if (filter.severity && i.severity !== filter.severity) continue;
      rows.push({ assetId: asset.id, filePath: asset.source.filePath, severity: i.severity, code: i.code, message: i.message });
    }
  }
  return rows;
}

export function listViews(): ViewSummary[] {
  return requireState().views.map(({ name, kind, subset }) => ({ name, kind, subset }));
}

const requireView = (state: InventoryState, name: string): InventoryView => {
  const view = findView(state.views, name);
  if (!view) {
    throw new DomainError({ code: 'NOT_FOUND', message: `View not found: ${name}`, details: { view: name } });
  }
  return view;
};

export function getView(name: string): ViewDetail {
  const state = requireState();
  const view = requireView(state, name);
  const { resolved } = resolveInventoryView(view, state.snapshot.assets);

  return {
    name: view.name,
    kind: view.kind,
    subset: view.subset,
    nodes: resolved.nodes.map((n) => ({ nodeId: n.nodeId, id: n.id, name: n.name, placeholder: n.kind === 'placeholder' })),
    edges: resolved.edges.map((e) => ({
      from: e.dependencyId,
      to: e.dependentId,
      commentary: e.commentary,
      insufficient: e.insufficient,
    })),
    placeholderIds: [...resolved.placeholderIds],
  };
}

export function getViewDot(name: string, theme?: DotThemeName): string {
  const state = requireState();
  const view = requireView(state, name);
  const { resolved } = resolveInventoryView(view, state.snapshot.assets);

  return renderDot(resolved, {
    title: state.snapshot.title,
    top: '',
    theme: themeByName(theme ?? state.theme),
    registry: state.snapshot.registry,
    issues: state.snapshot.issues,
  });
}
