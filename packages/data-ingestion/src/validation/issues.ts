import { ClassifiedIssue, ErrorCategory, FieldIssue, IssueKind, IssueSeverity } from '../types';
import { compareText } from '../utils/sorting';

const categoryMap: Record<IssueKind, ErrorCategory> = {
  null: ErrorCategory.QUALITY_ISSUE,
  empty_string: ErrorCategory.QUALITY_ISSUE,
  exact_duplicate: ErrorCategory.QUALITY_ISSUE,
  near_duplicate: ErrorCategory.QUALITY_ISSUE,
  orphan: ErrorCategory.QUALITY_ISSUE,
  out_of_range: ErrorCategory.QUALITY_ISSUE,
  unparseable: ErrorCategory.PARSE_FAILURE,
  coercion_failure: ErrorCategory.PARSE_FAILURE,
  malformed_row: ErrorCategory.PARSE_FAILURE,
  orphan_drop: ErrorCategory.CONTRACT_VIOLATION,
  key_missing: ErrorCategory.CONTRACT_VIOLATION,
  contract_violation: ErrorCategory.CONTRACT_VIOLATION
};

const severityMap: Record<IssueKind, IssueSeverity> = {
  null: 'info',
  empty_string: 'info',
  exact_duplicate: 'info',
  near_duplicate: 'warning',
  orphan: 'warning',
  out_of_range: 'warning',
  unparseable: 'warning',
  coercion_failure: 'warning',
  malformed_row: 'warning',
  orphan_drop: 'error',
  key_missing: 'error',
  contract_violation: 'error'
};

export function categorizeIssue(kind: IssueKind): ErrorCategory {
  return categoryMap[kind];
}

export function getIssueSeverity(kind: IssueKind): IssueSeverity {
  return severityMap[kind];
}

export function classifyIssue(issue: FieldIssue): ClassifiedIssue {
  return {
    ...issue,
    category: categorizeIssue(issue.issue_kind),
    severity: getIssueSeverity(issue.issue_kind)
  };
}

/**
 * Order by row, then field, then kind
 */
export function compareIssues(left: FieldIssue, right: FieldIssue): number {
  return left.source_row_id - right.source_row_id
    || compareText(left.field, right.field)
    || compareText(left.issue_kind, right.issue_kind);
}

/**
 * Issue counts per kind, keys in sorted order
 */
export function countIssues(issues: readonly FieldIssue[]): Partial<Record<IssueKind, number>> {
  const counts: Partial<Record<IssueKind, number>> = {};
  const kinds = [...new Set(issues.map(issue => issue.issue_kind))].sort();
  for (const kind of kinds) {
    counts[kind] = issues.filter(issue => issue.issue_kind === kind).length;
  }
  return counts;
}
