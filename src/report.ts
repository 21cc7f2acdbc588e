import type { OrganizationFailure, ScanResult, VisibilityFinding } from './types';

export const NO_ISSUES_MARKDOWN = '## :white_check_mark: No Issues Found\n\nAll repositories are compliant with policies.\n';

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/**
 * Console summary of a PR checker run. Returns true when every repository was checked
 * without error and has no unapproved PRs.
 */
export function printResults(results: readonly ScanResult[]): boolean {
  const withErrors = results.filter((result) => result.error);
  const withUnapproved = results.filter((result) => !result.error && result.unapprovedPRs.length > 0);
  const approved = results.filter((result) => !result.error && result.unapprovedPRs.length === 0);

  if (withErrors.length > 0) {
    console.log('\n🔴 ERRORS ENCOUNTERED:');
    for (const result of withErrors) {
      console.log(`  ${result.repository}: ${result.error?.message}`);
    }
  }

  if (withUnapproved.length > 0) {
    console.log('\n🔔 UNAPPROVED PULL REQUESTS:');
    for (const result of withUnapproved) {
      for (const pr of result.unapprovedPRs) {
        console.log(`- ${result.repository} #${pr.number}: ${pr.title} (created by ${pr.author}) ${pr.url}`);
      }
    }
  }

  console.log('\n📊 SUMMARY:');
  if (withErrors.length > 0) {
    console.log(`  Repositories with errors: ${withErrors.length}`);
  }
  if (withUnapproved.length > 0) {
    console.log(`  Repositories with unapproved PRs: ${withUnapproved.length}`);
  }
  console.log(`  Repositories with all PRs approved: ${approved.length}`);
  console.log(`  Total repositories checked: ${results.length}`);

  if (approved.length > 0) {
    console.log('\n✅ REPOSITORIES WITH ALL PRS APPROVED:');
    console.log(`  ${approved.map((result) => result.repository).join(', ')}`);
  }

  return withErrors.length === 0 && withUnapproved.length === 0;
}

/**
 * Markdown table of unapproved PRs. Results carrying an error are left out: their PR
 * lists are incomplete.
 */
export function formatPRResultsMarkdown(results: readonly ScanResult[]): string {
  const rows = results
    .filter((result) => !result.error)
    .flatMap((result) =>
      result.unapprovedPRs.map(
        (pr) => `| ${escapeCell(result.repository)} | [#${pr.number}](${pr.url}) | ${escapeCell(pr.title)} | ${escapeCell(pr.author)} |`,
      ),
    );

  if (rows.length === 0) {
    return '';
  }

  return [
    '## :rotating_light: Unapproved Pull Requests',
    '',
    '| Repository | PR | Title | Author |',
    '|------------|----|-------|--------|',
    ...rows,
    '',
    '',
  ].join('\n');
}

/**
 * Repositories that could not be checked. Their PR lists are not authoritative, so a
 * report with errors is never "no issues".
 */
export function formatErrorsMarkdown(
  results: readonly ScanResult[],
  failedOrganizations: readonly OrganizationFailure[] = [],
): string {
  const rows = [
    ...results.flatMap((result) => (result.error ? [[result.repository, result.error.message]] : [])),
    ...failedOrganizations.map((failure) => [`org:${failure.organization}`, failure.message]),
  ].map(([target, message]) => `| ${escapeCell(target)} | ${escapeCell(message)} |`);

  if (rows.length === 0) {
    return '';
  }

  return [
    '## :x: Repositories Not Checked',
    '',
    '| Repository | Error |',
    '|------------|-------|',
    ...rows,
    '',
    '',
  ].join('\n');
}

export function formatVisibilityMarkdown(findings: readonly VisibilityFinding[]): string {
  if (findings.length === 0) {
    return '';
  }

  return [
    '## :warning: Recently Public Repositories',
    '',
    '| Repository | Action Needed |',
    '|------------|---------------|',
    ...findings.map((repo) => `| ${escapeCell(repo)} | Review visibility settings |`),
    '',
    '',
  ].join('\n');
}

export function buildReport(
  prResults: readonly ScanResult[],
  findings: readonly VisibilityFinding[],
  failedOrganizations: readonly OrganizationFailure[] = [],
): string {
  const content =
    formatErrorsMarkdown(prResults, failedOrganizations) +
    formatPRResultsMarkdown(prResults) +
    formatVisibilityMarkdown(findings);
  return content || NO_ISSUES_MARKDOWN;
}
