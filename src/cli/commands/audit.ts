/**
 * `gatehouse audit` — inspect a JSONL audit log.
 *
 *   stats  <file>  counts by decision, layer, reason and event
 *   check  <file>  schema, decision lattice and no-`@` rule per row
 *   verify <file>  HMAC integrity tags
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { readJsonl, readJsonlValues } from '../../audit/audit-log.js';
import { loadIntegrityKey, verifyRows, type KeySource } from '../../audit/integrity.js';
import { checkRows, summarizeRows, type AuditStats } from '../../audit/stats.js';
import { ConfigManager } from '../../core/config.js';
import { configureLogger } from '../../core/logger.js';

export function createAuditCommand(): Command {
  const cmd = new Command('audit').description('Inspect an audit log (JSONL)');

  cmd
    .command('stats')
    .description('Summarize an audit log')
    .argument('<file>', 'Audit log path')
    .option('--json', 'Output as JSON')
    .action((file: string, options: { json?: boolean }) => {
      const stats = summarizeRows(readJsonl(resolve(file)));
      console.log(options.json ? JSON.stringify(stats, null, 2) : formatStats(stats));
    });

  cmd
    .command('check')
    .description('Check rows against the schema, the decision lattice and the no-@ rule')
    .argument('<file>', 'Audit log path')
    .option('--json', 'Output as JSON')
    .action((file: string, options: { json?: boolean }) => {
      const values = readJsonlValues(resolve(file));
      const issues = checkRows(values);
      if (options.json) {
        console.log(JSON.stringify({ rows: values.length, issues }, null, 2));
      } else if (issues.length === 0) {
        console.log(`OK: ${values.length} rows`);
      } else {
        for (const issue of issues) console.log(`row ${issue.index + 1}: ${issue.problems.join('; ')}`);
        console.log(`FAIL: ${issues.length} of ${values.length} rows`);
      }
      if (issues.length > 0) process.exitCode = 1;
    });

  cmd
    .command('verify')
    .description('Verify HMAC integrity tags')
    .argument('<file>', 'Audit log path')
    .option('-d, --dir <directory>', 'Project directory for the integrity key config', '.')
    .option('--key-file <path>', 'Read the key from this file')
    .action((file: string, options: { dir: string; keyFile?: string }) => {
      const config = new ConfigManager(resolve(options.dir)).load();
      configureLogger(config.logging);
      const source: KeySource = options.keyFile
        ? { keyMode: 'file', keyFile: options.keyFile }
        : config.integrity;
      const key = loadIntegrityKey(source);
      const rows = readJsonl(resolve(file));
      const bad = verifyRows(key, rows);
      if (bad.length === 0) {
        console.log(`OK: ${rows.length} rows verified`);
      } else {
        console.log(`FAIL: bad tag on rows ${bad.map(i => i + 1).join(', ')}`);
        process.exitCode = 1;
      }
    });

  return cmd;
}

function formatCounts(title: string, counts: Record<string, number>): string[] {
  const lines = [`  ${title}:`];
  const entries = Object.entries(counts).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  for (const [key, count] of entries) lines.push(`    ${key.padEnd(28)} ${count}`);
  return lines;
}

export function formatStats(stats: AuditStats): string {
  return [
    `  Rows: ${stats.totalRows}  |  Runs: ${stats.runs}  |  Seal rate: ${(stats.sealRate * 100).toFixed(2)}%`,
    `  Seal events: ${stats.sealEvents}  |  HITL requested: ${stats.hitlRequested}  |  RFL: ${stats.rflEscalations}  |  HITL decided: ${stats.hitlDecided}  |  User stops: ${stats.userStops}`,
    ...formatCounts('By decision', stats.byDecision),
    ...formatCounts('By layer', stats.byLayer),
    ...formatCounts('By reason', stats.byReasonCode),
  ].join('\n');
}
