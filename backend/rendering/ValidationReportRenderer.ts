import type { Asset } from '../inventory/Asset';
import type { IssueReport } from '../validation/IssueReport';
import { formatIssue } from '../validation/ValidationIssue';

/**
 * Plain-text validation report, one block per asset with issues, in input
 * order:
 *
 *     ASSET: srv_1 'Web server'
 *            in /inventory/servers.yaml
 *         WARNING: Has open issues
 */
export function renderValidationReport(assets: readonly Asset[], issues: IssueReport): string {
  const blocks: string[] = [];
  for (const asset of assets) {
    const list = issues.issuesFor(asset.id);
    if (list.length === 0) continue;
    blocks.push(
      [
        `ASSET: ${asset.id} '${asset.name}'`,
        `       in ${asset.source.filePath}`,
        ...list.map((i) => `    ${formatIssue(i)}`),
      ].join('\n'),
    );
  }
  return blocks.join('\n\n');
}

/** `ERROR: 1, WARNING: 4, NOTE: 2`, listing only severities that occur. */
export function renderIssueCounts(issues: IssueReport): string {
  const present = issues.presentCounts();
  if (present.length === 0) return 'No issues';
  return present.map(([severity, count]) => `${severity}: ${count}`).join(', ');
}
