import Table from 'cli-table3';
import chalk from 'chalk';
import type { RunReport } from '../core/orchestrator.js';
import { BACKEND_IDS } from '../config/schema.js';

export function renderTable(head: string[], rows: string[][]): string {
  const table = new Table({ head, style: { head: ['cyan'] } });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}

export function printTable(head: string[], rows: string[][]): void {
  console.log(renderTable(head, rows));
}

/** Outcome counts, then per-backend counts for the packages that reached a backend. */
export function renderSummary(report: RunReport): string {
  const succeededLabel = report.dryRun ? 'Would install' : 'Installed';
  const totals = renderTable(
    ['Considered', succeededLabel, 'Skipped', 'Failed'],
    [
      [
        String(report.considered),
        chalk.green(String(report.succeeded)),
        chalk.yellow(String(report.skipped)),
        report.failed ? chalk.red(String(report.failed)) : '0',
      ],
    ],
  );

  const backendRows = BACKEND_IDS.flatMap((backend) => {
    const tally = report.byBackend[backend];
    return tally
      ? [[backend, String(tally.succeeded), String(tally.skipped), String(tally.failed)]]
      : [];
  });
  if (backendRows.length === 0) return totals;

  const backends = renderTable(['Backend', succeededLabel, 'Skipped', 'Failed'], backendRows);
  return `${totals}\n${backends}`;
}

export function printSummary(report: RunReport): void {
  console.log(renderSummary(report));
}
