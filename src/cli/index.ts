#!/usr/bin/env node
/**
 * peerweave CLI.
 *
 * Commands:
 *   peerweave start [--config <path>]   Boot a node and run until SIGINT/SIGTERM
 *   peerweave config [--config <path>]  Print the resolved configuration
 *   peerweave stats [--url <base>]      Show gossip stats of a running node
 *   peerweave peers [--url <base>]      List the peer ids a running node knows
 */

import { loadMeshConfig } from "../config.js";
import { startNode } from "../node.js";
import { errorMessage, toRecord } from "../utils/guards.js";
import { parseCliArgs, type CliArgs } from "./args.js";

const DEFAULT_NODE_URL = "http://127.0.0.1:8000";

async function cmdStart(args: CliArgs): Promise<void> {
  const config = loadMeshConfig({ configPath: args.flags.config });
  const node = await startNode(config);

  let stopping = false;
  const shutdown = (sig: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    node.logger.info(`[peerweave:cli] Received ${sig}, shutting down`);
    node.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        node.logger.error(`[peerweave:cli] Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      },
    );
  };

  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.on(sig, shutdown);
  }
}

function cmdConfig(args: CliArgs): void {
  const config = loadMeshConfig({ configPath: args.flags.config });
  console.log(JSON.stringify(config, null, 2));
}

async function getJson(url: string): Promise<Record<string, unknown>> {
  const res = await fetch(url, { signal: AbortSignal.timeout(5_000) });
  if (!res.ok) {
    throw new Error(`${url} answered HTTP ${res.status}`);
  }
  return toRecord(await res.json());
}

async function cmdStats(args: CliArgs): Promise<void> {
  const base = (args.flags.url ?? DEFAULT_NODE_URL).replace(/\/+$/, "");
  const stats = await getJson(`${base}/gossip/stats`);
  for (const [key, value] of Object.entries(stats)) {
    console.log(`${key.padEnd(22)} ${String(value)}`);
  }
}

async function cmdPeers(args: CliArgs): Promise<void> {
  const base = (args.flags.url ?? DEFAULT_NODE_URL).replace(/\/+$/, "");
  const body = await getJson(`${base}/peers`);
  const peers = Array.isArray(body.peers) ? body.peers : [];
  if (peers.length === 0) {
    console.log("No peers known.");
    return;
  }
  for (const id of peers) console.log(String(id));
}

function showHelp(): void {
  console.log(`
peerweave: peer discovery and gossip for agent nodes

Usage:
  peerweave <command> [options]

Commands:
  start                   Start a node
    --config <path>       Config file (default: $PEERWEAVE_CONFIG, ./peerweave.json, ~/.peerweave/peerweave.json)
  config                  Print the resolved configuration
  stats                   Show gossip stats of a running node
    --url <base>          Node base URL (default: ${DEFAULT_NODE_URL})
  peers                   List peers known to a running node
  help                    Show this help message
`);
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  switch (args.command) {
    case "start":
      await cmdStart(args);
      break;
    case "config":
      cmdConfig(args);
      break;
    case "stats":
      await cmdStats(args);
      break;
    case "peers":
      await cmdPeers(args);
      break;
    case "help":
    case "--help":
    case "-h":
    case undefined:
      showHelp();
      break;
    default:
      console.error(`Unknown command: ${args.command}`);
      showHelp();
      process.exit(1);
  }
}

main().catch((err) => {
  console.error(errorMessage(err));
  process.exit(1);
});
