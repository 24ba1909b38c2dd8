/**
 * Environment variable handling with validation
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type NodeEnv = 'development' | 'production' | 'test';

export interface EnvConfig {
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
  valuationConfigPath: string | null;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim() ? value.trim() : undefined;
}

function pickOption<T extends string>(raw: string | undefined, options: readonly T[], fallback: T): T {
  return options.find((option) => option === raw) ?? fallback;
}

export function loadEnvConfig(): EnvConfig {
  const nodeEnv = pickOption(getEnvVar('NODE_ENV'), NODE_ENVS, 'development');
  // Tests stay quiet unless LOG_LEVEL asks otherwise
  const defaultLevel: LogLevel = nodeEnv === 'test' ? 'silent' : 'info';

  return {
    logLevel: pickOption(getEnvVar('LOG_LEVEL'), LOG_LEVELS, defaultLevel),
    nodeEnv,
    valuationConfigPath: getEnvVar('VALUATION_CONFIG') ?? null,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
