export type IssueSeverity = 'ERROR' | 'WARNING' | 'NOTE';

export const ISSUE_SEVERITIES: readonly IssueSeverity[] = ['ERROR', 'WARNING', 'NOTE'];

export type IssueCode =
  | 'UNKNOWN_ASSET_TYPE'
  | 'UNDEFINED_DEPENDENCY'
  | 'UNKNOWN_ID_PREFIX'
  | 'MISSING_DEPENDENTS'
  | 'MISSING_DEPENDENCIES'
  | 'OPEN_ISSUES'
  | 'NEEDS_WORK'
  | 'MISSING_REQUIRED_FIELD'
  | 'MISSING_REQUIRED_DEPENDENCY_TYPE'
  | 'EXCLUDED_DEPENDENCY'
  | 'TYPE_CHECKS_SKIPPED'
  | 'RULE_EVALUATION_ERROR';

/**
 * ValidationIssue (per-asset finding).
 *
 * Issues are data: rules return them, nothing throws them.
 */
export type ValidationIssue = {
  severity: IssueSeverity;
  code: IssueCode;
  message: string;
};

export const issue = (severity: IssueSeverity, code: IssueCode, message: string): ValidationIssue => ({
  severity,
  code,
  message,
});

/** `WARNING: Has open issues` */
export const formatIssue = (i: ValidationIssue): string => `${i.severity}: ${i.message}`;

/** Anything above NOTE marks the asset as needing attention in renderers. */
export const isDefect = (i: ValidationIssue): boolean => i.severity !== 'NOTE';
