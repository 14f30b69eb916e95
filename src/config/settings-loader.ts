/**
 * Settings Loader
 *
 * Loads relay settings from a YAML file. Keys are written in snake_case
 * in the file and mapped onto the camelCase settings object.
 *
 * Under `node_mappings`, scalar values are roles and nested mappings are
 * variants:
 *
 *   node_mappings:
 *     save_image_node: "9"
 *     ollama_node: 59
 *     text_to_image:
 *       description_node: "12"
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { debugLog } from '../debug.ts';
import { ConfigError } from './errors.ts';
import { RelaySettingsSchema, type RelaySettings } from './settings.ts';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function camelCase(key: string): string {
  return key.replace(/[_-]([a-z0-9])/g, (_, char: string) => char.toUpperCase());
}

function camelCaseKeys(value: unknown): unknown {
  if (!isRecord(value)) return value;
  return Object.fromEntries(Object.entries(value).map(([key, child]) => [camelCase(key), child]));
}

function nodeIdValue(value: unknown): unknown {
  return typeof value === 'number' ? String(value) : value;
}

/**
 * Split a raw `node_mappings` table into roles and variants.
 */
export function parseNodeMappings(raw: unknown): { roles: Record<string, unknown>; variants: Record<string, unknown> } {
  const roles: Record<string, unknown> = {};
  const variants: Record<string, unknown> = {};
  if (!isRecord(raw)) return { roles, variants };

  for (const [key, value] of Object.entries(raw)) {
    if (isRecord(value)) {
      variants[key] = Object.fromEntries(
        Object.entries(value).map(([role, nodeId]) => [role, nodeIdValue(nodeId)])
      );
    } else {
      roles[key] = nodeIdValue(value);
    }
  }
  return { roles, variants };
}

export class SettingsLoader {
  /**
   * Load settings from a file path. A missing file yields the defaults.
   *
   * @throws ConfigError CONFIG_PARSE_FAILED or CONFIG_INVALID
   */
  async loadFromFile(filePath: string): Promise<RelaySettings> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        debugLog(`[SettingsLoader] ${filePath} not found, using defaults`);
        return this.parse('', filePath);
      }
      throw ConfigError.parseFailed(filePath, error instanceof Error ? error : undefined);
    }

    return this.parse(content, filePath);
  }

  /**
   * Parse YAML settings content and apply defaults.
   */
  parse(content: string, source: string | null = null): RelaySettings {
    let raw: unknown;
    try {
      raw = parseYaml(content);
    } catch (error) {
      throw ConfigError.parseFailed(source ?? '<inline>', error instanceof Error ? error : undefined);
    }

    // An empty document parses to null
    if (raw === null || raw === undefined) {
      raw = {};
    }
    if (!isRecord(raw)) {
      throw ConfigError.invalid(source, 'top level must be a mapping');
    }

    return this.validate(this.normalize(raw), source);
  }

  /**
   * Validate an already camelCased settings object.
   */
  validate(input: unknown, source: string | null = null): RelaySettings {
    const result = RelaySettingsSchema.safeParse(input);
    if (!result.success) {
      const reason = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw ConfigError.invalid(source, reason);
    }

    debugLog(`[SettingsLoader] Loaded settings from ${source ?? 'defaults'}`);
    return result.data;
  }

  private normalize(raw: Record<string, unknown>): Record<string, unknown> {
    const settings: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(raw)) {
      const name = camelCase(key);
      settings[name] = name === 'nodeMappings' ? parseNodeMappings(value) : camelCaseKeys(value);
    }

    return settings;
  }
}

export const settingsLoader = new SettingsLoader();

export default settingsLoader;
