/**
 * Terminal output: ANSI colours and sync report rendering
 *
 * Colours are dropped when NO_COLOR is set.
 */

import type { SkipReason, SyncReport, TargetResult } from '@expert-council/core';

function paint(code: string, text: string): string {
  return 'NO_COLOR' in process.env ? text : `\x1b[${code}m${text}\x1b[0m`;
}

export const color = {
  bold: (s: string) => paint('1', s),
  dim: (s: string) => paint('2', s),
  red: (s: string) => paint('31', s),
  green: (s: string) => paint('32', s),
  yellow: (s: string) => paint('33', s),
  cyan: (s: string) => paint('36', s),
};

const SKIP_REASONS: Record<SkipReason, string> = {
  unmanaged: 'not created by council',
  modified: 'edited since the last sync',
};

/**
 * Lines describing one target's outcome. A dry run lists what would happen.
 */
export function formatTargetResult(result: TargetResult): string[] {
  const { plan, dryRun } = result;
  const created = dryRun ? plan.create.map((f) => f.path) : result.created;
  const updated = dryRun ? plan.update.map((f) => f.path) : result.updated;
  const deleted = dryRun ? plan.delete : result.deleted;
  const removed = dryRun ? plan.removeDeprecated : result.removedDeprecated;
  const verb = (done: string, planned: string) => (dryRun ? `would ${planned}` : done);

  const lines: string[] = [];
  for (const p of created) lines.push(`  ${color.green('+')} ${verb('created', 'create')} ${p}`);
  for (const p of updated) lines.push(`  ${color.cyan('~')} ${verb('updated', 'update')} ${p}`);
  for (const p of deleted) lines.push(`  ${color.red('-')} ${verb('deleted', 'delete')} ${p}`);
  for (const p of removed) lines.push(`  ${color.red('-')} ${verb('removed deprecated', 'remove deprecated')} ${p}`);
  for (const s of result.skipped) lines.push(`  ${color.yellow('!')} skipped ${s.path} (${SKIP_REASONS[s.reason]})`);
  for (const e of result.errors) lines.push(`  ${color.red('✗')} ${e.operation} ${e.path}: ${e.message}`);

  for (const p of plan.deprecated.filter((d) => !removed.includes(d))) {
    lines.push(`  ${color.yellow('⚠')} deprecated ${p} still exists; run with --clean to remove it`);
  }

  const counts = dryRun
    ? `${created.length} to create, ${updated.length} to update, ${result.unchanged.length} unchanged, ${deleted.length} to delete`
    : `${created.length} created, ${updated.length} updated, ${result.unchanged.length} unchanged, ${deleted.length} deleted`;
  const trailer = `${result.skipped.length} skipped, ${result.errors.length} failed`;
  lines.push(`  ${color.dim(`${counts}, ${trailer}`)}`);
  return lines;
}

export function formatSyncReport(report: SyncReport): string[] {
  const lines: string[] = [];

  if (report.dryRun) {
    lines.push(color.yellow('Dry run: no files were changed'), '');
  }
  if (report.resolvedBy === 'fallback') {
    lines.push(color.dim('No AI tool detected; using the fallback target'));
  }
  for (const warning of report.warnings) {
    lines.push(`${color.yellow('⚠')} ${warning}`);
  }

  let skipped = 0;
  for (const target of report.targets) {
    if (target.status === 'failed') {
      lines.push(`${color.red('✗')} ${target.displayName} (${target.target}): ${target.error}`);
      continue;
    }
    skipped += target.result.skipped.length;
    // Per-file failures leave the target usable but incomplete
    const mark = target.result.errors.length > 0 ? color.yellow('⚠') : color.green('✓');
    lines.push(`${mark} ${target.displayName} (${target.target})`, ...formatTargetResult(target.result));
  }

  if (skipped > 0) {
    lines.push('', color.dim('Run with --force to overwrite files that were edited or not created by council.'));
  }
  return lines;
}

/**
 * The report as printed by --json: planned writes are listed by path, without
 * their content.
 */
export function toJsonReport(report: SyncReport) {
  return {
    ...report,
    targets: report.targets.map((t) => {
      if (t.status === 'failed') return t;
      const { plan } = t.result;
      return {
        ...t,
        result: {
          ...t.result,
          plan: { ...plan, create: plan.create.map((f) => f.path), update: plan.update.map((f) => f.path) },
        },
      };
    }),
  };
}

/** Whether a report should make the process exit non-zero */
export function reportFailed(report: SyncReport): boolean {
  return !report.ok || report.targets.some((t) => t.status === 'ok' && t.result.errors.length > 0);
}

export function printLines(lines: string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}
