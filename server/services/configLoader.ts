import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { ConfigError, type NetworkConfig, validateNetworkConfig } from '../types.js';

// JSON is a subset of YAML, so one parser covers .yml, .yaml and .json files.
export function parseNetworkConfig(text: string, source = 'config'): NetworkConfig {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not parse ${source}`, [reason]);
  }

  const result = validateNetworkConfig(raw);
  if (!result.ok) throw new ConfigError(`Invalid network config in ${source}`, result.errors);
  return result.config;
}

export async function loadNetworkConfig(filePath: string): Promise<NetworkConfig> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Could not read ${filePath}`, [reason]);
  }
  return parseNetworkConfig(text, filePath);
}
