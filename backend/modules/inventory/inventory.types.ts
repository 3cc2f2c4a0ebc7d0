import type { DependentTiers } from '../../analysis/DependentTiers';
import type { ExportedAsset } from '../../interoperability/SnapshotExport';
import type { IssueCounts } from '../../validation/IssueReport';
import type { IssueCode, IssueSeverity } from '../../validation/ValidationIssue';
import type { InventoryViewKind } from '../../views/StandardViews';

export type InventorySummary = {
  title: string;
  generated: string;
  assetCount: number;
  archivedCount: number;
  issueCounts: IssueCounts;
  assetsWithIssues: number;
  types: string[];
};

export type AssetFilter = {
  type?: string;
  tag?: string;
  /** Only assets carrying at least one issue of this severity. */
  severity?: IssueSeverity;
  includeArchived?: boolean;
};

export type AssetDetail = {
  asset: ExportedAsset;
  archived: boolean;
  tiers: DependentTiers;
};

export type IssueRow = {
  assetId: string;
  filePath: string;
  severity: IssueSeverity;
  code: IssueCode;
  message: string;
};

export type ViewSummary = {
  name: string;
  kind: InventoryViewKind;
  subset: string;
};

export type ViewNodeRow = {
  nodeId: string;
  id: string;
  name: string;
  placeholder: boolean;
};

export type ViewEdgeRow = {
  from: string;
  to: string;
  commentary: string;
  insufficient: boolean;
};

export type ViewDetail = ViewSummary & {
  nodes: ViewNodeRow[];
  edges: ViewEdgeRow[];
  placeholderIds: string[];
};
