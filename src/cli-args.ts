/**
 * Command-line options for the relay process.
 */

import type { RelaySettings } from './config/settings.ts';

export interface CLIOptions {
  configPath: string;
  httpPort?: number;
  wsPort?: number;
  workflowPath?: string;
  debug: boolean;
}

export const DEFAULT_CONFIG_PATH = 'config/relay.yaml';

export class CLIArgumentError extends Error {
  override readonly name = 'CLIArgumentError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, CLIArgumentError.prototype);
  }
}

function valueAfter(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;

  const value = args[index + 1];
  if (!value || value.startsWith('--')) {
    throw new CLIArgumentError(`${flag} requires a value`);
  }
  return value;
}

function portAfter(args: string[], flag: string): number | undefined {
  const value = valueAfter(args, flag);
  if (value === undefined) return undefined;

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || String(parsed) !== value || parsed < 0 || parsed > 65535) {
    throw new CLIArgumentError(`Invalid port for ${flag}: ${value}`);
  }
  return parsed;
}

/**
 * @throws CLIArgumentError on a missing or malformed value
 */
export function parseArgs(args: string[]): CLIOptions {
  return {
    configPath: valueAfter(args, '--config') ?? DEFAULT_CONFIG_PATH,
    httpPort: portAfter(args, '--port'),
    wsPort: portAfter(args, '--ws-port'),
    workflowPath: valueAfter(args, '--workflow'),
    debug: args.includes('--debug'),
  };
}

/**
 * Layer command-line overrides on top of file settings.
 */
export function applyOverrides(settings: RelaySettings, options: CLIOptions): RelaySettings {
  return {
    ...settings,
    http: { ...settings.http, port: options.httpPort ?? settings.http.port },
    relay: { ...settings.relay, wsPort: options.wsPort ?? settings.relay.wsPort },
    workflow: { ...settings.workflow, path: options.workflowPath ?? settings.workflow.path },
    logging: { ...settings.logging, debug: options.debug || settings.logging.debug },
  };
}
