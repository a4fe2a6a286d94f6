/**
 * `gatehouse mediate` — contract mediation runs sharing one trust store.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { JsonlAuditLog } from '../../audit/audit-log.js';
import { ConfigManager } from '../../core/config.js';
import { configureLogger } from '../../core/logger.js';
import type { HitlMode } from '../../core/types.js';
import { resolverForMode } from '../../hitl/resolvers.js';
import { DEFAULT_LOCATION, DEFAULT_SCENARIO } from '../../mediation/contract.js';
import { ContractMediator, type MediationResult } from '../../mediation/mediator.js';
import { MemoryTrustStore } from '../../mediation/trust.js';
import { parseHitlMode, parseInteger, parseProbability } from '../options.js';

export function createMediateCommand(): Command {
  const cmd = new Command('mediate');

  cmd
    .description('Run emergency-priority contract mediation with evidence, trust and ADMIN finalization')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--runs <n>', 'Consecutive runs sharing one trust state', parseInteger, 1)
    .option('--hitl <mode>', 'HITL mode: seeded, interactive, continue, stop, none', parseHitlMode)
    .option('--seed <n>', 'Seed for the seeded HITL resolver', parseInteger)
    .option('--p-continue <p>', 'Probability the seeded resolver answers CONTINUE', parseProbability)
    .option('--grant', 'Issue a standing grant for the scenario and location')
    .option('--fabricate', 'Mark the simulated evidence as fabricated')
    .option('--auth-ttl <seconds>', 'Authorization request lifetime', parseInteger)
    .option('--audit <path>', 'Append audit rows to this JSONL file')
    .option('--json', 'Output results as JSON')
    .action(async (options: MediateCommandOptions) => {
      await executeMediate(options);
    });

  return cmd;
}

export interface MediateCommandOptions {
  dir: string;
  runs: number;
  hitl?: HitlMode;
  seed?: number;
  pContinue?: number;
  grant?: boolean;
  fabricate?: boolean;
  authTtl?: number;
  audit?: string;
  json?: boolean;
}

export async function executeMediate(options: MediateCommandOptions): Promise<MediationResult[]> {
  const projectDir = resolve(options.dir);
  const config = new ConfigManager(projectDir).load({
    hitl: { mode: options.hitl, seed: options.seed, pContinue: options.pContinue },
  });
  configureLogger(config.logging);

  const store = new MemoryTrustStore();
  if (options.grant) {
    store.addGrant({
      grantId: 'GRANT#CLI',
      scenario: DEFAULT_SCENARIO,
      locationId: DEFAULT_LOCATION,
      expiresAt: new Date(Date.now() + 3600 * 1000).toISOString(),
      issuedBy: 'ADMIN',
    });
  }

  const mediator = new ContractMediator({ store, authTtlSeconds: options.authTtl });
  const audit = options.audit ? new JsonlAuditLog(resolve(projectDir, options.audit)) : undefined;
  const resolver = resolverForMode(config.hitl);
  const results: MediationResult[] = [];
  try {
    for (let i = 1; i <= options.runs; i++) {
      results.push(await mediator.run({
        runId: `MED#${String(i).padStart(3, '0')}`,
        fabricateEvidence: options.fabricate,
        resolver,
        audit,
      }));
    }
  } finally {
    resolver?.close?.();
  }

  if (options.json) {
    console.log(JSON.stringify(results.map(({ rows: _rows, ...rest }) => rest), null, 2));
    return results;
  }

  console.log();
  for (const result of results) {
    const sealed = result.sealed ? ', sealed' : '';
    console.log(`  ${result.runId}: ${result.state} (${result.reasonCode}${sealed})  trust ${result.trust.score.toFixed(3)}`);
  }
  if (options.audit) console.log(`  Audit -> ${options.audit}`);
  console.log();
  return results;
}
