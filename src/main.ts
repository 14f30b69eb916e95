#!/usr/bin/env tsx
/**
 * Workflow Relay
 *
 * Runs the relay as a standalone process: HTTP control surface in front of
 * the generative engine, WebSocket fan-out of its event stream.
 *
 * Usage:
 *   tsx src/main.ts                                  # config/relay.yaml
 *   tsx src/main.ts --config /etc/relay.yaml         # Custom config file
 *   tsx src/main.ts --port 9000 --ws-port 9001       # Override listen ports
 *   tsx src/main.ts --workflow workflows/other.json  # Override workflow
 *   tsx src/main.ts --debug                          # Write debug.log
 */

import { applyOverrides, parseArgs } from './cli-args.ts';
import { settingsLoader } from './config/settings-loader.ts';
import { setDebugEnabled, setLogFile, setVerboseEnabled } from './debug.ts';
import { RelayServer } from './server/relay-server.ts';

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const settings = applyOverrides(await settingsLoader.loadFromFile(options.configPath), options);

  setLogFile(settings.logging.logFile);
  setDebugEnabled(settings.logging.debug);
  setVerboseEnabled(settings.logging.verbose);

  console.log(`\n╔══════════════════════════════════════════════════════════════╗`);
  console.log(`║                       Workflow Relay                         ║`);
  console.log(`╚══════════════════════════════════════════════════════════════╝\n`);

  console.log(`  Config:     ${options.configPath}`);
  console.log(`  Engine:     ${settings.engine.host}:${settings.engine.port}`);
  console.log(`  Workflow:   ${settings.workflow.path}`);
  console.log(`  Save node:  ${settings.nodeMappings.roles.save_image_node ?? '9 (default)'}\n`);

  const relay = new RelayServer(settings);
  const { httpPort, wsPort } = await relay.start();

  console.log(`────────────────────────────────────────────────────────────────`);
  console.log(`\n  Relay running!\n`);
  console.log(`  HTTP API:`);
  console.log(`    http://${settings.http.host}:${httpPort}\n`);
  console.log(`  Event relay:`);
  console.log(`    ws://${settings.relay.host}:${wsPort}\n`);
  console.log(`────────────────────────────────────────────────────────────────`);
  console.log(`\n  Press Ctrl+C to stop.\n`);

  let shuttingDown = false;
  const handleSignal = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\n  Shutting down...');
    await relay.stop();
    console.log('  Relay stopped.\n');
    process.exit(0);
  };

  const onSignal = () => {
    handleSignal().catch((err: unknown) => {
      console.error('Shutdown failed:', err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
