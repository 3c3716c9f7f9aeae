/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { TableStat } from "../../db/migrate.js";
import type { CacheSnapshot } from "../../services/cache/builder.js";
import type { ReconcileResult } from "../../services/sync/reconcile.js";

/**
 * Display the door view (tag -> membership level)
 */
export function displayDoorCacheTable(snapshot: CacheSnapshot): void {
  const table = new CliTable3({
    head: [chalk.cyan("Tag ID"), chalk.cyan("Membership Level")],
    colWidths: [14, 20],
  });

  const tags = [...snapshot.door.keys()].sort((a, b) => a - b);
  for (const tagId of tags) {
    table.push([String(tagId), String(snapshot.door.get(tagId) ?? 0)]);
  }

  console.log(table.toString());
  console.log(chalk.gray(`\n${String(tags.length)} tag(s)\n`));
}

/**
 * Display the machine view (tag -> trainings)
 */
export function displayMachineCacheTable(snapshot: CacheSnapshot): void {
  const table = new CliTable3({
    head: [chalk.cyan("Tag ID"), chalk.cyan("Trainings")],
    colWidths: [14, 70],
    wordWrap: true,
  });

  const tags = [...snapshot.machine.keys()].sort((a, b) => a - b);
  for (const tagId of tags) {
    const trainings = snapshot.machine.get(tagId) ?? [];
    table.push([
      String(tagId),
      trainings.length > 0 ? trainings.join(", ") : chalk.gray("(none)"),
    ]);
  }

  console.log(table.toString());
  console.log(chalk.gray(`\n${String(tags.length)} tag(s)\n`));
}

/**
 * Display the result of a reconciliation, listing skipped contacts
 */
export function displayReconcileSummary(result: ReconcileResult): void {
  console.log(chalk.bold("\nReconciliation:"));
  console.log(`  Contacts processed:  ${String(result.processed)}`);
  console.log(`  Members upserted:    ${String(result.upserted)}`);
  console.log(`  Without a tag:       ${String(result.unassigned)}`);
  console.log(`  Training links:      ${String(result.linksWritten)}`);

  if (result.skipped.length === 0) {
    console.log();
    return;
  }

  console.log(
    chalk.yellow(`\nSkipped contacts (${String(result.skipped.length)}):`)
  );
  const table = new CliTable3({
    head: [chalk.cyan("Contact"), chalk.cyan("Field"), chalk.cyan("Reason")],
    colWidths: [12, 12, 70],
    wordWrap: true,
  });
  for (const skipped of result.skipped) {
    table.push([
      skipped.contactId !== null ? String(skipped.contactId) : chalk.gray("?"),
      skipped.scope,
      skipped.reason,
    ]);
  }
  console.log(table.toString());
  console.log();
}

/**
 * Display row counts per table
 */
export function displayTableStats(stats: TableStat[]): void {
  for (const row of stats) {
    console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
  }
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}
