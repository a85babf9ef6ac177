import { Command } from 'commander';
import { checkCommand } from './commands/check';
import { formatCommand } from './commands/format';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program.name('dirconf').description('Check and format directive configuration files').version(VERSION);

  program.addCommand(checkCommand);
  program.addCommand(formatCommand);

  return program;
}
