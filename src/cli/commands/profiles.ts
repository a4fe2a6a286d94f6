/**
 * `gatehouse profiles` — run the fixed benchmark profiles and compare them.
 */

import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { BENCHMARK_PROFILES, getProfile, getProfileNames, runProfiles } from '../../benchmark/profiles.js';
import { BenchmarkReporter } from '../../benchmark/reporter.js';
import type { BenchmarkProfile } from '../../benchmark/types.js';
import { ConfigError } from '../../core/errors.js';
import { parseInteger } from '../options.js';

export function createProfilesCommand(): Command {
  const cmd = new Command('profiles');

  cmd
    .description('Run the benchmark profiles: ' + getProfileNames().join(', '))
    .option('--only <names>', 'Comma-separated profile names')
    .option('--runs <n>', 'Override the run count of every profile', parseInteger)
    .option('--output <path>', 'Write JSON results to file')
    .option('--json', 'Output results as JSON to stdout')
    .action(async (options: ProfilesCommandOptions) => {
      await executeProfiles(options);
    });

  return cmd;
}

interface ProfilesCommandOptions {
  only?: string;
  runs?: number;
  output?: string;
  json?: boolean;
}

export function selectProfiles(only?: string): BenchmarkProfile[] {
  if (!only) return [...BENCHMARK_PROFILES];
  return only.split(',').map(name => {
    const profile = getProfile(name.trim());
    if (!profile) throw new ConfigError(`Unknown profile: ${name}`);
    return profile;
  });
}

async function executeProfiles(options: ProfilesCommandOptions): Promise<void> {
  const reporter = new BenchmarkReporter();
  const results = await runProfiles(selectProfiles(options.only), { runs: options.runs });

  if (options.json) {
    console.log(reporter.formatJSON(results));
  } else {
    console.log(reporter.formatProfiles(results));
  }

  if (options.output) {
    writeFileSync(options.output, reporter.formatJSON(results), 'utf-8');
    if (!options.json) console.log(`  Results saved to: ${options.output}\n`);
  }
}
