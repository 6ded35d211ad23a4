import { Command } from 'commander';
import { registerAskCommand } from './ask';
import { registerConfigCommand } from './config';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerAskCommand(program);
  registerConfigCommand(program);
}
