import type { AnnotatedAsset } from '../inventory/AnnotatedAsset';
import type { InventorySnapshot } from '../pipeline/InventoryPipeline';
import type { IssueCounts } from '../validation/IssueReport';
import type { ValidationIssue } from '../validation/ValidationIssue';

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export type ExportedAsset = {
  id: string;
  type: string | null;
  name: string;
  dependsOn: string[];
  tags: string[];
  fields: Record<string, string | string[]>;
  source: { filePath: string; index: number };
  dependents: string[];
  dependentTypes: string[];
  dependentIds: string[];
  issues: ValidationIssue[];
};

/** JSON-ready form of the annotated snapshot; sets become sorted arrays. */
export type InventoryExport = {
  title: string;
  generated: string;
  issueCounts: IssueCounts;
  assets: ExportedAsset[];
  archived: ExportedAsset[];
};

export const exportAsset = (asset: AnnotatedAsset, snapshot: Pick<InventorySnapshot, 'issues'>): ExportedAsset => ({
  id: asset.id,
  type: asset.type ?? null,
  name: asset.name,
  dependsOn: [...asset.dependsOn],
  tags: [...asset.tags],
  fields: Object.fromEntries(
    Array.from(asset.fields.entries()).map(([k, v]) => [k, typeof v === 'string' ? v : [...v]] as const),
  ),
  source: { filePath: asset.source.filePath, index: asset.source.index },
  dependents: [...asset.dependents],
  dependentTypes: Array.from(asset.dependentTypes).sort(compareStrings),
  dependentIds: Array.from(asset.dependentIds).sort(compareStrings),
  issues: [...snapshot.issues.issuesFor(asset.id)],
});

export function exportSnapshot(snapshot: InventorySnapshot): InventoryExport {
  return {
    title: snapshot.title,
    generated: snapshot.generated,
    issueCounts: snapshot.issues.counts(),
    assets: snapshot.assets.map((a) => exportAsset(a, snapshot)),
    archived: snapshot.archived.map((a) => exportAsset(a, snapshot)),
  };
}
