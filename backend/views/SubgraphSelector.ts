import { edgeDependencyIds } from '../inventory/DependencyExpression';
import type { AnnotatedAsset, LabelField } from '../inventory/AnnotatedAsset';
import { DomainError } from '../reliability/DomainError';
import { telemetry } from '../telemetry/Telemetry';

export type SubgraphSelection = {
  /** Regular expression over labels (asset types or ids). */
  pattern: string;
  field: LabelField;
  /** Select assets NOT leading to `pattern`, closed over their dependencies. */
  negate?: boolean;
  /** Upper bound on fixpoint passes in negated mode. */
  maxFixpointPasses?: number;
};

export const DEFAULT_MAX_FIXPOINT_PASSES = 10_000;

const compile = (source: string): RegExp => {
  try {
    return new RegExp(source);
  } catch (err) {
    throw new DomainError({
      code: 'VALIDATION_ERROR',
      message: `Invalid selection pattern "${source}".`,
      details: { pattern: source },
      cause: err,
    });
  }
};

const anyLabelMatches = (labels: ReadonlySet<string>, re: RegExp): boolean => {
  for (const label of labels) {
    if (re.test(label)) return true;
  }
  return false;
};

/**
 * Adds, pass after pass, every resolvable non-excluded dependency of the
 * selection until a pass adds nothing. The result is dependency-closed.
 */
export function closeOverDependencies<T extends AnnotatedAsset>(
  start: readonly T[],
  all: readonly T[],
  maxPasses: number = DEFAULT_MAX_FIXPOINT_PASSES,
): T[] {
  const lookup = new Map<string, T>();
  for (const a of all) if (!lookup.has(a.id)) lookup.set(a.id, a);

  const use = [...start];
  const included = new Set(use.map((a) => a.id));

  let passes = 0;
  let added = true;
  while (added) {
    passes += 1;
    if (passes > maxPasses) {
      throw new DomainError({
        code: 'TRAVERSAL_LIMIT_EXCEEDED',
        message: `Dependency closure did not settle within ${maxPasses} passes.`,
        details: { maxFixpointPasses: maxPasses, selected: use.length },
      });
    }

    added = false;
    for (const asset of [...use]) {
      for (const dep of edgeDependencyIds(asset)) {
        const target = lookup.get(dep);
        if (!target || included.has(dep)) continue;
        included.add(dep);
        use.push(target);
        added = true;
      }
    }
  }

  return use;
}

/**
 * Selects the assets relevant to a focused view.
 *
 * - Non-negated: assets with a `field` label fully matching `pattern`.
 * - Negated: the complement, then closed over its dependencies.
 *
 * Input order is preserved; dependencies pulled in by the closure follow.
 */
export function selectSubgraph<T extends AnnotatedAsset>(assets: readonly T[], selection: SubgraphSelection): T[] {
  const re = compile(`^(?:${selection.pattern})$`);

  return telemetry.measure(
    'view.select',
    { field: selection.field, negate: Boolean(selection.negate) },
    () => {
      const matched = assets.filter((a) => anyLabelMatches(a[selection.field], re));
      if (!selection.negate) return matched;

      const matchedIds = new Set(matched.map((a) => a.id));
      const complement = assets.filter((a) => !matchedIds.has(a.id));
      return closeOverDependencies(complement, assets, selection.maxFixpointPasses);
    },
    (selected) => ({ inputCount: assets.length, selectedCount: selected.length }),
  );
}

/**
 * Leaf-type trimming: keeps assets that lead to a type searched by `pattern`
 * (unanchored), or, negated, the assets that do not.
 */
export function trimToLeafType<T extends AnnotatedAsset>(assets: readonly T[], pattern: string, negate = false): T[] {
  const re = compile(pattern);
  return assets.filter((a) => anyLabelMatches(a.dependentTypes, re) !== negate);
}
