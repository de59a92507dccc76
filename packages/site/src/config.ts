import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, searchStorePath, serverLog } from '@quire/core';

/** Config file name at the knowledge root */
export const CONFIG_FILE = 'quire.json';

export const SiteConfigSchema = z.object({
  /** Directory holding the markdown sources, relative to the root */
  docsRoot: z.string().min(1).default('knowledge'),
  /** Directory receiving the rendered site, relative to the root */
  outputDir: z.string().min(1).default('_site'),
  /** Site name shown on the index page */
  title: z.string().default('Quire'),
  /** Index Draft documents as well as Public ones; false limits search to published pages */
  indexDrafts: z.boolean().default(true),
});

export type SiteConfig = z.infer<typeof SiteConfigSchema>;

/** Default config for new knowledge bases */
export const DEFAULT_SITE_CONFIG: SiteConfig = SiteConfigSchema.parse({});

/** Absolute locations derived from a root and its config */
export interface SitePaths {
  root: string;
  docsRoot: string;
  outputDir: string;
  searchStore: string;
  configFile: string;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Validate an already-parsed config object
 */
export function parseSiteConfig(value: unknown, source: string = CONFIG_FILE): SiteConfig {
  const parsed = SiteConfigSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/**
 * Load config from <root>/quire.json.
 * Returns defaults if the file does not exist.
 */
export async function loadSiteConfig(root: string): Promise<SiteConfig> {
  const configPath = path.join(root, CONFIG_FILE);

  let text: string;
  try {
    text = await fs.promises.readFile(configPath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      serverLog('config', `No ${CONFIG_FILE} in ${root}, using defaults`);
      return { ...DEFAULT_SITE_CONFIG };
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read ${configPath}: ${reason}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid ${CONFIG_FILE}: ${reason}`);
  }

  const config = parseSiteConfig(json);
  serverLog('config', `Loaded ${configPath}`);
  return config;
}

/**
 * Write config to <root>/quire.json
 */
export async function saveSiteConfig(root: string, config: SiteConfig): Promise<void> {
  const configPath = path.join(root, CONFIG_FILE);
  try {
    await fs.promises.mkdir(root, { recursive: true });
    await fs.promises.writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot write ${configPath}: ${reason}`);
  }
}

/**
 * Resolve config directories against the root (absolute values pass through)
 */
export function resolveSitePaths(root: string, config: SiteConfig): SitePaths {
  const absoluteRoot = path.resolve(root);
  return {
    root: absoluteRoot,
    docsRoot: path.resolve(absoluteRoot, config.docsRoot),
    outputDir: path.resolve(absoluteRoot, config.outputDir),
    searchStore: searchStorePath(absoluteRoot),
    configFile: path.join(absoluteRoot, CONFIG_FILE),
  };
}
