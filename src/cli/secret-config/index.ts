/**
 * Requirements addressed:
 * - Provide a `secret-config` CLI exposing `check`.
 */

import { Command } from 'commander';

import { registerCheckCommand } from '../../commands/registerCheckCommand';

const program = new Command()
  .name('secret-config')
  .description('Secret-backed configuration resolution helpers.');

registerCheckCommand(program);

await program.parseAsync();
