import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createPlanCommand } from './commands/plan.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('gopack')
    .description('Plan the package build order of a Go application')
    .version(readVersion());
  [createPlanCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
