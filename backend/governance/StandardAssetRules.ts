import { hasAssetField, hasTag, idPrefixOf, NEEDS_WORK_TAG } from '../inventory/Asset';
import type { AssetTypeRegistry } from '../inventory/AssetTypeRegistry';
import { dependencyIds, exclusionFor, parseDependencies } from '../inventory/DependencyExpression';
import { issue, type ValidationIssue } from '../validation/ValidationIssue';
import type { AssetRule } from './AssetRule';
import { RuleSet } from './RuleSet';

/** Type reported for a dependency id that resolves to nothing. */
export const NO_TYPE = 'NO-TYPE';

export const UNIVERSAL_PATTERN = '.*';

const freezeRule = (rule: AssetRule): Readonly<AssetRule> => Object.freeze({ ...rule });

/**
 * Standard inventory rules, in evaluation order.
 *
 * Known-type runs first: its ERROR explains why the type-dependent rules
 * after it are skipped for the same asset.
 */
export const createStandardAssetRules = (registry: AssetTypeRegistry): readonly AssetRule[] => {
  const typeOf = (typeName: string | undefined) => registry.get(typeName);

  return Object.freeze([
    freezeRule({
      name: 'known-asset-type',
      typeDependent: false,
      evaluate: (asset) =>
        registry.has(asset.type) ? [] : [issue('ERROR', 'UNKNOWN_ASSET_TYPE', `Has unknown type ${asset.type ?? '(none)'}`)],
    }),

    freezeRule({
      name: 'no-undefined-dependency',
      typeDependent: false,
      evaluate: (asset, lookup) =>
        parseDependencies(asset)
          .filter((d) => !d.excluded && !lookup.has(d.id))
          .map((d) => issue('WARNING', 'UNDEFINED_DEPENDENCY', `Depends on undefined asset ID=${d.id}`)),
    }),

    freezeRule({
      name: 'known-id-prefix',
      typeDependent: false,
      evaluate: (asset) =>
        registry.hasPrefix(idPrefixOf(asset.id)) ? [] : [issue('WARNING', 'UNKNOWN_ID_PREFIX', 'Has unknown prefix')],
    }),

    freezeRule({
      name: 'dependents-unless-top',
      typeDependent: true,
      evaluate: (asset, _lookup, dependents) => {
        const type = typeOf(asset.type);
        if (!type || type.tags.has('top')) return [];
        if ((dependents.get(asset.id)?.length ?? 0) > 0) return [];
        return [issue('WARNING', 'MISSING_DEPENDENTS', 'Non-top-level asset has no dependents')];
      },
    }),

    freezeRule({
      name: 'dependencies-unless-bottom',
      typeDependent: true,
      evaluate: (asset) => {
        const type = typeOf(asset.type);
        if (!type || type.tags.has('bottom')) return [];
        if (asset.dependsOn.length > 0) return [];
        return [issue('WARNING', 'MISSING_DEPENDENCIES', 'Non-bottom-level asset has no dependencies')];
      },
    }),

    freezeRule({
      name: 'open-issues',
      typeDependent: false,
      evaluate: (asset) =>
        hasAssetField(asset, 'open_issues') ? [issue('WARNING', 'OPEN_ISSUES', 'Has open issues')] : [],
    }),

    freezeRule({
      name: 'needs-work-tag',
      typeDependent: false,
      evaluate: (asset) =>
        hasTag(asset, NEEDS_WORK_TAG) ? [issue('WARNING', 'NEEDS_WORK', `Has '${NEEDS_WORK_TAG}' tag`)] : [],
    }),

    freezeRule({
      name: 'required-fields',
      typeDependent: true,
      evaluate: (asset) => {
        const type = typeOf(asset.type);
        if (!type) return [];
        return type.requiredFields
          .filter((field) => !hasAssetField(asset, field))
          .map((field) =>
            issue('WARNING', 'MISSING_REQUIRED_FIELD', `'${asset.type}' definition missing '${field}' field`),
          );
      },
    }),

    freezeRule({
      name: 'required-dependency-types',
      typeDependent: true,
      evaluate: (asset, lookup) => {
        const type = typeOf(asset.type);
        if (!type) return [];

        const allIds = dependencyIds(asset);
        const sufficientTypes = dependencyIds(asset, { sufficientOnly: true }).map(
          (id) => lookup.get(id)?.type ?? NO_TYPE,
        );

        const out: ValidationIssue[] = [];
        for (const pattern of type.requiredDependencyPatterns) {
          if (allIds.includes(exclusionFor(pattern))) {
            out.push(issue('NOTE', 'EXCLUDED_DEPENDENCY', `Specifically excludes '${pattern}' dependency`));
            continue;
          }
          const re = new RegExp(pattern);
          if (sufficientTypes.some((t) => re.test(t))) continue;
          out.push(
            issue(
              'WARNING',
              'MISSING_REQUIRED_DEPENDENCY_TYPE',
              `'${asset.type}' should define '${pattern}' dependency`,
            ),
          );
        }
        return out;
      },
    }),
  ]);
};

/** All standard rules registered on the universal pattern. */
export const createStandardRuleSet = (registry: AssetTypeRegistry): RuleSet =>
  new RuleSet([{ pattern: UNIVERSAL_PATTERN, rules: createStandardAssetRules(registry) }]);
