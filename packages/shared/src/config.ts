import { DEFAULT_DIRECTORY_FILE, DEFAULT_GRID_SQUARE } from './constants.ts';

export interface MapperConfig {
  directoryFile: string;
  defaultGrid: string;
}

type EnvLike = Record<string, string | undefined>;

function fromEnv(env: EnvLike, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

/**
 * Defaults for the command-line workers. Flags override these.
 */
export function loadConfig(env: EnvLike): MapperConfig {
  return {
    directoryFile: fromEnv(env, 'RBN_DIRECTORY_FILE', DEFAULT_DIRECTORY_FILE),
    defaultGrid: fromEnv(env, 'RBN_DEFAULT_GRID', DEFAULT_GRID_SQUARE),
  };
}
