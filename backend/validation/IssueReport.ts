import { ISSUE_SEVERITIES, isDefect, type IssueSeverity, type ValidationIssue } from './ValidationIssue';

export type IssueCounts = Record<IssueSeverity, number>;

/**
 * Issues per asset id, in discovery order.
 *
 * Only assets with at least one issue are held; `issuesFor` answers an empty
 * list for the rest.
 */
export class IssueReport {
  private readonly byAssetId = new Map<string, readonly ValidationIssue[]>();

  set(assetId: string, issues: readonly ValidationIssue[]): void {
    if (issues.length === 0) {
      this.byAssetId.delete(assetId);
      return;
    }
    this.byAssetId.set(assetId, Object.freeze([...issues]));
  }

  issuesFor(assetId: string): readonly ValidationIssue[] {
    return this.byAssetId.get(assetId) ?? [];
  }

  has(assetId: string): boolean {
    return this.byAssetId.has(assetId);
  }

  /** True when the asset has at least one ERROR or WARNING. */
  hasDefects(assetId: string): boolean {
    return this.issuesFor(assetId).some(isDefect);
  }

  assetIds(): string[] {
    return Array.from(this.byAssetId.keys());
  }

  entries(): Array<[string, readonly ValidationIssue[]]> {
    return Array.from(this.byAssetId.entries());
  }

  get size(): number {
    return this.byAssetId.size;
  }

  counts(): IssueCounts {
    const counts: IssueCounts = { ERROR: 0, WARNING: 0, NOTE: 0 };
    for (const issues of this.byAssetId.values()) {
      for (const i of issues) counts[i.severity] += 1;
    }
    return counts;
  }

  /** Severities that occur at least once, with their counts, in severity order. */
  presentCounts(): Array<[IssueSeverity, number]> {
    const counts = this.counts();
    return ISSUE_SEVERITIES.filter((s) => counts[s] > 0).map((s): [IssueSeverity, number] => [s, counts[s]]);
  }

  hasErrors(): boolean {
    return this.counts().ERROR > 0;
  }

  toJSON(): Record<string, readonly ValidationIssue[]> {
    return Object.fromEntries(this.byAssetId);
  }
}
