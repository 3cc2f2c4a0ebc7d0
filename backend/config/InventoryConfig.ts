import { DEFAULT_MAX_TRAVERSAL_STEPS } from '../analysis/DependentPropagation';
import { DomainError } from '../reliability/DomainError';
import { isDotThemeName, type DotThemeName } from '../rendering/DotTheme';
import { DEFAULT_MAX_FIXPOINT_PASSES } from '../views/SubgraphSelector';

export type InventoryConfig = {
  apiPort: number;
  apiTimeoutMs: number;
  /** Asset YAML files, from the comma-separated INVENTORY_ASSETS. */
  assetFiles: string[];
  /** INVENTORY_TYPES; null selects the bundled IT asset catalog. */
  typesFile: string | null;
  outputDir: string;
  theme: DotThemeName;
  maxTraversalSteps: number;
  maxFixpointPasses: number;
};

type Env = Record<string, string | undefined>;

const text = (env: Env, name: string): string => String(env[name] ?? '').trim();

const positiveInt = (env: Env, name: string, fallback: number): number => {
  const raw = text(env, name);
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new DomainError({
      code: 'VALIDATION_ERROR',
      message: `${name} must be a positive integer (got "${raw}").`,
      details: { name, value: raw },
    });
  }
  return value;
};

const list = (env: Env, name: string): string[] =>
  text(env, name)
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);

/**
 * Reads configuration from the environment.
 *
 * Call sites load `.env` first (`import 'dotenv/config'`); this function only
 * parses what is there, so tests pass their own `env`.
 */
export function loadInventoryConfig(env: Env = process.env): InventoryConfig {
  const theme = text(env, 'INVENTORY_THEME') || 'light';
  if (!isDotThemeName(theme)) {
    throw new DomainError({
      code: 'VALIDATION_ERROR',
      message: `INVENTORY_THEME must be "light" or "dark" (got "${theme}").`,
      details: { name: 'INVENTORY_THEME', value: theme },
    });
  }

  return {
    apiPort: positiveInt(env, 'API_PORT', 3001),
    apiTimeoutMs: positiveInt(env, 'API_TIMEOUT_MS', 15000),
    assetFiles: list(env, 'INVENTORY_ASSETS'),
    typesFile: text(env, 'INVENTORY_TYPES') || null,
    outputDir: text(env, 'INVENTORY_OUTPUT_DIR') || 'asset_inventory',
    theme,
    maxTraversalSteps: positiveInt(env, 'INVENTORY_MAX_TRAVERSAL_STEPS', DEFAULT_MAX_TRAVERSAL_STEPS),
    maxFixpointPasses: positiveInt(env, 'INVENTORY_MAX_FIXPOINT_PASSES', DEFAULT_MAX_FIXPOINT_PASSES),
  };
}
