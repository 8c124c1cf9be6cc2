import type { BankSummary, FlowOutcome, RunSummary } from '@bankrecon/types';

/**
 * Renders items as an indented, sorted bullet list starting on a new line.
 */
export function formatList(items: Iterable<string>, indent = 4): string {
  const pad = ' '.repeat(indent);
  return [...items]
    .sort((a, b) => a.localeCompare(b))
    .map((item) => `\n${pad}- ${item}`)
    .join('');
}

function formatBank(bankId: string, info: BankSummary): string[] {
  const lines: string[] = [];

  lines.push(`Bank ${bankId}:`);
  lines.push(`  Categories merged:    ${info.merged.length}`);
  for (const category of [...info.merged].sort((a, b) => a.localeCompare(b))) {
    lines.push(`    + ${category}`);
  }
  lines.push(`  Files without data:   ${info.missing.length}`);
  for (const fileName of [...info.missing].sort((a, b) => a.localeCompare(b))) {
    lines.push(`    ? ${fileName}`);
  }
  lines.push(`  Files with errors:    ${info.errors.length}`);
  for (const fileName of [...info.errors].sort((a, b) => a.localeCompare(b))) {
    lines.push(`    ! ${fileName}`);
  }
  lines.push(`  Final columns:        ${info.columns.length}`);

  for (const note of info.notes) {
    lines.push(`  Note: ${note}`);
  }

  const stats = info.stats;
  if (stats !== undefined) {
    lines.push('  Dataset:');
    lines.push(`    Total rows:           ${stats.totalRows}`);
    lines.push(`    Total columns:        ${stats.totalColumns}`);
    lines.push(`    Static columns:       ${stats.staticColumns.length} (${stats.staticColumns.join(', ')})`);
    lines.push(`    Category columns:     ${stats.dynamicColumns.length}`);
    lines.push(`    Multi-category rows:  ${stats.multiCategory}`);
  }

  return lines;
}

function formatFlow(outcome: FlowOutcome): string {
  const label = `${outcome.bankId} ${outcome.flow.toUpperCase()}`;
  switch (outcome.status) {
    case 'completed':
      return `  [completed] ${label} -> ${outcome.outputPath} (${outcome.rowCount} rows)`;
    case 'skipped':
      return `  [skipped]   ${label}: ${outcome.reason}`;
    case 'failed':
      return `  [failed]    ${label}: ${outcome.error}`;
  }
}

/**
 * Human-readable end-of-run report for the log file and console.
 */
export function formatRunSummary(summary: RunSummary, flows: readonly FlowOutcome[] = []): string {
  const lines: string[] = [];

  lines.push('=== Run Summary ===');
  lines.push(`Processed ${summary.banks.size} bank(s)`);

  for (const [bankId, info] of summary.banks) {
    lines.push('');
    lines.push(...formatBank(bankId, info));
  }

  if (flows.length > 0) {
    lines.push('');
    lines.push('Flows:');
    for (const outcome of flows) {
      lines.push(formatFlow(outcome));
    }
  }

  lines.push('===================');
  return lines.join('\n');
}
