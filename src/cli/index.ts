/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createLogger, setLogger } from '../core/logger.js';
import { createRunCommand } from './commands/run.js';
import { createInitCommand } from './commands/init.js';
import { createBenchmarkCommand } from './commands/benchmark.js';
import { createProfilesCommand } from './commands/profiles.js';
import { createStressCommand } from './commands/stress.js';
import { createAuditCommand } from './commands/audit.js';
import { createMediateCommand } from './commands/mediate.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Gatehouse: fail-closed gates, HITL escalation and audit logs for document tasks')
    .option('-v, --verbose', 'Pretty-print debug logs to stdout');

  // Swap the file logger for a pretty one before any command builds its components
  program.hook('preAction', (thisCommand) => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      setLogger(createLogger(NAME, { pretty: true, level: 'debug' }), { pin: true });
    }
  });

  program.addCommand(createRunCommand());
  program.addCommand(createInitCommand());
  program.addCommand(createBenchmarkCommand());
  program.addCommand(createProfilesCommand());
  program.addCommand(createStressCommand());
  program.addCommand(createAuditCommand());
  program.addCommand(createMediateCommand());

  return program;
}

export async function main(): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n✗ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
