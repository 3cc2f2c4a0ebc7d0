import type { AssetLookup, DependentsMap } from '../graph/DependencyGraph';
import type { Asset } from '../inventory/Asset';
import type { ValidationIssue } from '../validation/ValidationIssue';

/**
 * AssetRule (executable validation rule).
 *
 * - Receives one asset plus the whole graph; never mutates either.
 * - `typeDependent` rules read the asset's registry entry and are skipped for
 *   assets whose type is not registered.
 */
export type AssetRule = {
  readonly name: string;
  readonly typeDependent: boolean;
  evaluate(asset: Asset, lookup: AssetLookup, dependents: DependentsMap): readonly ValidationIssue[];
};
