import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import { promptForConfig } from '../prompts';
import { loadConfig, type DeepPartial } from '../../config/loader';
import { ConfigValidationError, type Config } from '../../config/validator';

const MASK = '********';

/** Render the credentials chosen during `config init` as .env lines */
export function toEnvFile(config: DeepPartial<Config>): string {
  let envContent = '';
  if (config.tavily?.api_key) {
    envContent += `TAVILY_API_KEY=${config.tavily.api_key}\n`;
  }
  if (config.groq?.api_key) {
    envContent += `GROQ_API_KEY=${config.groq.api_key}\n`;
  }
  if (config.groq?.model) {
    envContent += `GROQ_MODEL=${config.groq.model}\n`;
  }
  return envContent;
}

/** Copy of the configuration with every credential replaced by a mask */
export function maskSecrets(config: Config): Config {
  return {
    tavily: { ...config.tavily, api_key: config.tavily.api_key ? MASK : '' },
    groq: { ...config.groq, api_key: config.groq.api_key ? MASK : '' },
  };
}

function reportLoadFailure(error: unknown): void {
  if (error instanceof ConfigValidationError) {
    console.log(chalk.red('✗ Configuration is invalid:'));
    error.issues.forEach((issue) => console.log(chalk.red(`  - ${issue}`)));
  } else {
    console.error(chalk.red('Failed to load configuration:'));
    if (error instanceof Error) {
      console.error(chalk.red(error.message));
    }
  }
  process.exitCode = 1;
}

export function registerConfigCommand(program: Command): void {
  const configCommand = program.command('config').description('Manage configuration');

  configCommand
    .command('init')
    .description('Initialize configuration interactively')
    .action(async () => {
      console.log(chalk.blue('Initializing configuration...'));
      const config = await promptForConfig();

      const targetPath = path.join(process.cwd(), '.env');
      if (fs.existsSync(targetPath)) {
        console.log(chalk.yellow('.env file already exists. Overwriting...'));
      }

      fs.writeFileSync(targetPath, toEnvFile(config));
      console.log(chalk.green(`Configuration saved to ${targetPath}`));
    });

  configCommand
    .command('validate')
    .description('Validate current configuration')
    .action(() => {
      try {
        const config = loadConfig();
        console.log(chalk.green('✓ Configuration is valid.'));
        console.log(chalk.gray(`  search: tavily (${config.tavily.search_depth}, ${config.tavily.max_results} results)`));
        console.log(chalk.gray(`  model:  ${config.groq.model}`));
      } catch (error) {
        reportLoadFailure(error);
      }
    });

  configCommand
    .command('show')
    .description('Show current configuration')
    .action(() => {
      try {
        console.log(JSON.stringify(maskSecrets(loadConfig()), null, 2));
      } catch (error) {
        reportLoadFailure(error);
      }
    });
}
