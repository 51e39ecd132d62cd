/**
 * Report Generator
 *
 * Renders compatibility reports as console text (colored), JSON, Markdown or
 * HTML, and migration plans as console text, JSON or Markdown.
 */

import chalk from 'chalk';
import { Change, CompatibilityReport, MigrationPlan, ReportFormat, Severity } from './types';

// ─── Severity Icons & Colors ────────────────────────────────────────────────

const SEVERITY_ICON: Record<Severity, string> = {
  breaking: '🔴',
  warning: '🟡',
  info: '🟢',
};

const SEVERITY_LABEL: Record<Severity, string> = {
  breaking: 'BREAKING',
  warning: 'WARNING',
  info: 'INFO',
};

const SEVERITY_ORDER: Record<Severity, number> = { breaking: 0, warning: 1, info: 2 };

function title(report: CompatibilityReport): string {
  const { format, oldVersion, newVersion } = report.metadata;
  const versions = oldVersion && newVersion ? ` v${oldVersion} → v${newVersion}` : '';
  return `Compatibility Report: ${format ?? 'schema'}${versions}`;
}

function verdict(report: CompatibilityReport): string {
  return report.isCompatible ? 'Compatible' : 'Incompatible';
}

// ─── Format Report ──────────────────────────────────────────────────────────

export function formatReport(report: CompatibilityReport, format: ReportFormat): string {
  switch (format) {
    case 'console':
      return formatConsole(report);
    case 'json':
      return JSON.stringify(report, null, 2);
    case 'markdown':
      return formatMarkdown(report);
    case 'html':
      return formatHtml(report);
  }
}

// ─── Console Format ─────────────────────────────────────────────────────────

function formatConsole(report: CompatibilityReport): string {
  const lines: string[] = [];
  const bar = '━'.repeat(50);
  const hints = new Map(report.issues.map((issue) => [issue.change, issue.hint]));

  lines.push('');
  lines.push(chalk.bold(`🔍 ${title(report)}`));
  lines.push(chalk.gray(bar));

  if (report.changes.length === 0) {
    lines.push(chalk.green('  ✅ No changes detected'));
  } else {
    const sorted = [...report.changes].sort((a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]);

    for (const change of sorted) {
      const icon = SEVERITY_ICON[change.severity];
      const label = SEVERITY_LABEL[change.severity].padEnd(8);
      const colorFn =
        change.severity === 'breaking'
          ? chalk.red
          : change.severity === 'warning'
            ? chalk.yellow
            : chalk.green;

      lines.push(`${icon} ${colorFn(label)} ${change.description}`);
      const hint = hints.get(change);
      if (hint) lines.push(chalk.gray(`            ↳ ${hint}`));
    }
  }

  lines.push(chalk.gray(bar));

  const { breaking, warning, info } = report.summary;
  lines.push(
    `Summary: ${chalk.red(`${breaking} breaking`)} | ${chalk.yellow(`${warning} warnings`)} | ${chalk.green(`${info} info`)}`
  );
  lines.push(`Compatibility Score: ${scoreColor(report.compatibilityScore)}`);
  lines.push(`Verdict: ${report.isCompatible ? chalk.green(verdict(report)) : chalk.red(verdict(report))}`);
  lines.push('');

  return lines.join('\n');
}

function scoreColor(score: number): string {
  if (score >= 90) return chalk.green(`${score}%`);
  if (score >= 70) return chalk.yellow(`${score}%`);
  return chalk.red(`${score}%`);
}

// ─── Markdown Format ────────────────────────────────────────────────────────

const MARKDOWN_HEADING: Record<Severity, string> = {
  breaking: '## 🔴 Breaking Changes',
  warning: '## 🟡 Warnings',
  info: '## 🟢 Info',
};

function formatMarkdown(report: CompatibilityReport): string {
  const lines: string[] = [];

  lines.push(`# 🔍 ${title(report)}`);
  lines.push('');
  lines.push(`**Compatibility Score:** ${report.compatibilityScore}%`);
  lines.push(`**Verdict:** ${verdict(report)}`);
  lines.push('');

  if (report.changes.length === 0) {
    lines.push('✅ **No changes detected**');
    return lines.join('\n');
  }

  const grouped = groupBySeverity(report.changes);
  const hints = new Map(report.issues.map((issue) => [issue.change, issue.hint]));

  for (const severity of ['breaking', 'warning', 'info'] as const) {
    if (grouped[severity].length === 0) continue;
    lines.push(MARKDOWN_HEADING[severity]);
    lines.push('');
    for (const c of grouped[severity]) {
      lines.push(`- **${c.path}**: ${c.description}`);
      if (severity !== 'info' && (c.before || c.after)) {
        lines.push(`  - Before: \`${c.before || 'N/A'}\` → After: \`${c.after || 'N/A'}\``);
      }
      const hint = hints.get(c);
      if (hint) lines.push(`  - Hint: ${hint}`);
    }
    lines.push('');
  }

  lines.push('---');
  lines.push('');
  lines.push(
    `**Summary:** ${report.summary.breaking} breaking | ${report.summary.warning} warnings | ${report.summary.info} info`
  );

  return lines.join('\n');
}

// ─── HTML Format ────────────────────────────────────────────────────────────

function formatHtml(report: CompatibilityReport): string {
  const score = report.compatibilityScore;
  const scoreClass = score >= 90 ? 'high' : score >= 70 ? 'mid' : 'low';

  const changeRows = report.changes
    .map(
      (c) => `
    <tr>
      <td><span class="badge badge-${c.severity}">${SEVERITY_LABEL[c.severity]}</span></td>
      <td><code>${escapeHtml(c.path)}</code></td>
      <td>${escapeHtml(c.description)}</td>
      <td>${c.rule ? `<code>${escapeHtml(c.rule)}</code>` : '—'}</td>
    </tr>`
    )
    .join('\n');

  const summaryCards = (['breaking', 'warning', 'info'] as const)
    .map(
      (severity) => `
      <div class="card ${severity}">
        <div class="count">${report.summary[severity]}</div>
        <div class="label">${SEVERITY_LABEL[severity]}</div>
      </div>`
    )
    .join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>${escapeHtml(title(report))}</title>
  <style>
    body { font-family: system-ui, sans-serif; background: #0f172a; color: #e2e8f0; padding: 2rem; }
    .container { max-width: 960px; margin: 0 auto; }
    .summary { display: flex; gap: 1rem; margin: 1.5rem 0; }
    .card { background: #1e293b; border-radius: 8px; padding: 1rem; flex: 1; text-align: center; }
    .count, .score { font-size: 2rem; font-weight: 700; }
    .breaking .count, .score.low { color: #ef4444; }
    .warning .count, .score.mid { color: #f59e0b; }
    .info .count, .score.high { color: #22c55e; }
    .label { color: #94a3b8; font-size: 0.75rem; text-transform: uppercase; }
    table { width: 100%; border-collapse: collapse; background: #1e293b; }
    th, td { padding: 0.75rem 1rem; border-top: 1px solid #334155; text-align: left; font-size: 0.875rem; }
    .badge { padding: 0.2rem 0.6rem; border-radius: 4px; font-size: 0.7rem; font-weight: 600; }
    .badge-breaking { color: #ef4444; }
    .badge-warning { color: #f59e0b; }
    .badge-info { color: #22c55e; }
  </style>
</head>
<body>
  <div class="container">
    <h1>🔍 ${escapeHtml(title(report))}</h1>
    <div class="summary">${summaryCards}
      <div class="card">
        <div class="score ${scoreClass}">${score}%</div>
        <div class="label">${verdict(report)}</div>
      </div>
    </div>
    ${
      report.changes.length === 0
        ? '<p>✅ No changes detected</p>'
        : `<table>
      <thead>
        <tr><th>Severity</th><th>Path</th><th>Change</th><th>Rule</th></tr>
      </thead>
      <tbody>
        ${changeRows}
      </tbody>
    </table>`
    }
  </div>
</body>
</html>`;
}

// ─── Migration Plan ─────────────────────────────────────────────────────────

export type PlanFormat = 'console' | 'json' | 'markdown';

export function formatPlan(plan: MigrationPlan, format: PlanFormat): string {
  const { format: schemaFormat, sourceVersion, targetVersion } = plan.metadata;
  const heading = `Migration Plan: ${schemaFormat ?? 'schema'} v${sourceVersion ?? '?'} → v${targetVersion ?? '?'}`;

  switch (format) {
    case 'json':
      return JSON.stringify(plan, null, 2);
    case 'markdown': {
      const lines = [`# ${heading}`, ''];
      if (plan.steps.length === 0) lines.push('✅ **Nothing to migrate**');
      plan.steps.forEach((step, i) => {
        const marker = plan.instructions[i].change.isBreaking ? ' 🔴' : '';
        lines.push(`${i + 1}. \`${step}\`${marker}`);
      });
      return lines.join('\n');
    }
    case 'console': {
      const lines = ['', chalk.bold(`🛠  ${heading}`), chalk.gray('━'.repeat(50))];
      if (plan.steps.length === 0) lines.push(chalk.green('  ✅ Nothing to migrate'));
      plan.steps.forEach((step, i) => {
        const text = plan.instructions[i].change.isBreaking ? chalk.red(step) : step;
        lines.push(`${String(i + 1).padStart(3)}. ${text}`);
      });
      lines.push('');
      return lines.join('\n');
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function groupBySeverity(changes: Change[]): Record<Severity, Change[]> {
  return {
    breaking: changes.filter((c) => c.severity === 'breaking'),
    warning: changes.filter((c) => c.severity === 'warning'),
    info: changes.filter((c) => c.severity === 'info'),
  };
}

function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
