/**
 * `gatehouse init` — write a starter `.gatehouse.yaml`.
 */

import { Command } from 'commander';
import { existsSync } from 'fs';
import { join, resolve } from 'path';
import { ConfigManager } from '../../core/config.js';

export function createInitCommand(): Command {
  const cmd = new Command('init');

  cmd
    .description('Create .gatehouse.yaml in the project directory')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action((options: { dir: string }) => {
      const projectDir = resolve(options.dir);
      const existed = existsSync(join(projectDir, '.gatehouse.yaml'));
      const path = new ConfigManager(projectDir).createDefaultProjectConfig();
      console.log(existed ? `Config already exists: ${path}` : `Created ${path}`);
    });

  return cmd;
}
