import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, Config, ConfigValidationError, describeIssues } from './validator';
import { defaults } from './defaults';

/**
 * PartialConfig allows for recursive partials of our Config interface
 * This is useful for CLI and YAML overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? DeepPartial<U>[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export type LoadConfigOptions = {
  /** Directory searched for config.yaml (defaults to process.cwd()) */
  cwd?: string;
  /** Environment to read credentials from; when omitted `.env` is loaded into process.env */
  env?: NodeJS.ProcessEnv;
};

/**
 * Merge defaults, config.yaml, environment and CLI overrides (in that order)
 * and validate the result.
 *
 * @throws ConfigValidationError when the merged configuration is invalid
 */
export function loadConfig(cliOverrides: DeepPartial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const env = options.env ?? loadDotenv();

  // 1. Start with Defaults
  const config: Record<string, unknown> = structuredClone(defaults);

  // 2. Override with config.yaml (if exists)
  const yamlPath = path.join(options.cwd ?? process.cwd(), 'config.yaml');
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isRecord(parsedYaml)) {
      deepMerge(config, parsedYaml);
    }
  }

  // 3. Override with Environment Variables
  deepMerge(config, {
    tavily: {
      api_key: env.TAVILY_API_KEY,
      max_results: env.TAVILY_MAX_RESULTS,
      search_depth: env.TAVILY_SEARCH_DEPTH,
    },
    groq: {
      api_key: env.GROQ_API_KEY,
      model: env.GROQ_MODEL,
    },
  });

  // 4. Override with CLI Arguments
  deepMerge(config, cliOverrides);

  // 5. Validate with Zod
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(describeIssues(result.error));
  }

  return result.data;
}

function loadDotenv(): NodeJS.ProcessEnv {
  dotenv.config();
  return process.env;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Simple deep merge for config objects. Undefined and empty-string values
 * in the source never replace what the target already holds.
 */
function deepMerge(target: Record<string, unknown>, source: object): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (isRecord(sourceValue)) {
      const targetValue = target[key];
      const nested: Record<string, unknown> = isRecord(targetValue) ? targetValue : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (sourceValue !== undefined && sourceValue !== '') {
      target[key] = sourceValue;
    }
  }
}
