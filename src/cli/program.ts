import { Command } from 'commander';
import { registerCommands } from './commands';
import { VERSION } from '../version';

export function createProgram(): Command {
  const program = new Command();

  program.name('research-agent').description('Search, draft, review and refine an answer to a question').version(VERSION).option('--verbose', 'Show detailed output');

  registerCommands(program);
  return program;
}
