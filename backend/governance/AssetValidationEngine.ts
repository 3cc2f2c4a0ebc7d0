import type { DependencyGraph } from '../graph/DependencyGraph';
import { typeLabelOf, type Asset } from '../inventory/Asset';
import type { AssetTypeRegistry } from '../inventory/AssetTypeRegistry';
import { DomainError } from '../reliability/DomainError';
import { telemetry } from '../telemetry/Telemetry';
import { IssueReport } from '../validation/IssueReport';
import { issue, type ValidationIssue } from '../validation/ValidationIssue';
import type { RuleSet } from './RuleSet';

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * AssetValidationEngine (passive).
 *
 * One responsibility: run the RuleSet against every asset and collect issues.
 *
 * Notes:
 * - Assets are evaluated in input order, rules in registration order.
 * - Does NOT mutate assets or the graph.
 * - Unknown asset types: type-dependent rules are skipped and one aggregate
 *   NOTE records how many.
 * - A throwing rule still leaves the asset's partial issues in the report
 *   before the failure propagates.
 */
export class AssetValidationEngine {
  private readonly ruleSet: RuleSet;
  private readonly registry: AssetTypeRegistry;

  constructor(args: { ruleSet: RuleSet; registry: AssetTypeRegistry }) {
    this.ruleSet = args.ruleSet;
    this.registry = args.registry;
  }

  validateAsset(asset: Asset, graph: Pick<DependencyGraph, 'lookup' | 'dependents'>, report: IssueReport): void {
    const issues: ValidationIssue[] = [];
    const knownType = this.registry.has(asset.type);
    let ruleName = '';
    try {
      let skipped = 0;
      for (const rule of this.ruleSet.rulesFor(typeLabelOf(asset))) {
        if (rule.typeDependent && !knownType) {
          skipped += 1;
          continue;
        }
        ruleName = rule.name;
        issues.push(...rule.evaluate(asset, graph.lookup, graph.dependents));
      }
      if (skipped > 0) {
        issues.push(
          issue('NOTE', 'TYPE_CHECKS_SKIPPED', `Skipped ${skipped} type-dependent checks for unknown type`),
        );
      }
    } catch (err) {
      issues.push(issue('ERROR', 'RULE_EVALUATION_ERROR', `Rule ${ruleName} failed: ${errorMessage(err)}`));
      throw new DomainError({
        code: 'RULE_EVALUATION_ERROR',
        message: `Failed validating asset ${asset.id} (rule ${ruleName}).`,
        details: { assetId: asset.id, rule: ruleName, filePath: asset.source.filePath },
        cause: err,
      });
    } finally {
      report.set(asset.id, issues);
    }
  }

  /**
   * Validates every asset. Pass `report` to keep partial results when a rule
   * throws; otherwise a fresh report is returned.
   */
  validate(input: {
    assets: readonly Asset[];
    graph: Pick<DependencyGraph, 'lookup' | 'dependents'>;
    report?: IssueReport;
  }): IssueReport {
    const report = input.report ?? new IssueReport();

    return telemetry.measure(
      'inventory.validate',
      { ruleCount: this.ruleSet.ruleCount },
      () => {
        for (const asset of input.assets) this.validateAsset(asset, input.graph, report);
        return report;
      },
      (r) => ({ assetCount: input.assets.length, assetsWithIssues: r.size }),
    );
  }
}
