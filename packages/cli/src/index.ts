#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import type { Server } from "node:http";
import { resolve } from "node:path";
import { ConsoleLogger, Journal } from "@ghostwalk/journal";
import { RelayMetrics, RelayServer, createStatusApp } from "@ghostwalk/relay";
import { formatEventLine, loadConfig, parsePort, summarizeSessions } from "./config.js";
import { SCRIPTED_ENGINE } from "./engine-loader.js";
import { runPlay } from "./play.js";

// Global error handlers: an unhandled rejection must not leave a half-running session
process.on("unhandledRejection", (reason) => {
  console.error("[ghostwalk] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[ghostwalk] Uncaught exception:", err);
  process.exit(1);
});

const config = loadConfig();
const logger = new ConsoleLogger("cli", config.logLevel);

const program = new Command();
program.name("ghostwalk").description("Shared-overworld multiplayer for a single-player handheld game").version("0.1.0");

program.command("play").description("Join a relay and play")
  .argument("[host]", "Relay host", config.host)
  .option("-p, --port <port>", "Relay port", String(config.port))
  .option("-e, --engine <engine>", `Engine: "${SCRIPTED_ENGINE}" or a path to an adapter module`, SCRIPTED_ENGINE)
  .option("--rom <path>", "Cartridge image handed to the engine adapter")
  .option("--save <path>", "Battery save file", config.savePath)
  .option("--journal <path>", "Session journal", config.journalPath)
  .option("--checkpoints <path>", "JSON overrides for the checkpoint table")
  .option("--name <name>", "Player name (scripted engine only)")
  .option("--fast", "Run emulation unthrottled")
  .action(async (host: string, opts: {
    port: string; engine: string; rom?: string; save: string; journal: string;
    checkpoints?: string; name?: string; fast?: boolean;
  }) => {
    try {
      const result = await runPlay({
        host,
        port: parsePort(opts.port),
        engine: opts.engine,
        savePath: resolve(opts.save),
        journalPath: resolve(opts.journal),
        fast: opts.fast === true,
        logger: logger.child("play"),
        ...(opts.rom !== undefined ? { romPath: resolve(opts.rom) } : {}),
        ...(opts.checkpoints !== undefined ? { checkpointsPath: resolve(opts.checkpoints) } : {}),
        ...(opts.name !== undefined ? { name: opts.name } : {}),
      });
      console.log(`Session ${result.sessionId} ended after ${result.framesStepped} frames`);
      process.exit(0);
    } catch (err) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

program.command("relay").description("Start the relay server")
  .option("-p, --port <port>", "TCP port for game clients", String(config.port))
  .option("--host <host>", "Interface to bind", "0.0.0.0")
  .option("--status-port <port>", "HTTP port for /health and /metrics", String(config.statusPort))
  .option("--no-status", "Do not start the HTTP status endpoint")
  .action(async (opts: { port: string; host: string; statusPort: string; status: boolean }) => {
    const metrics = new RelayMetrics();
    const relay = new RelayServer({ logger: logger.child("relay"), metrics });
    const address = await relay.listen(parsePort(opts.port), opts.host);
    console.log(`Relay listening on ${address.address}:${address.port}`);

    let statusServer: Server | null = null;
    if (opts.status) {
      const statusPort = parsePort(opts.statusPort, "status port");
      statusServer = createStatusApp(relay, metrics).listen(statusPort, opts.host, () => {
        console.log(`Status endpoint on http://${opts.host}:${statusPort}/health`);
      });
    }

    // Graceful shutdown
    const shutdown = async () => {
      console.log("\nShutting down...");
      statusServer?.close();
      await relay.close();
      process.exit(0);
    };
    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
  });

const journalCmd = program.command("journal").description("Inspect recorded play sessions");
journalCmd.command("ls").description("List sessions")
  .option("--journal <path>", "Session journal", config.journalPath)
  .action(async (opts: { journal: string }) => {
    const journal = new Journal(resolve(opts.journal), { lock: false });
    await journal.init();
    const sessions = summarizeSessions(await journal.readAll());
    if (sessions.length === 0) { console.log("No sessions found."); return; }
    for (const s of sessions) console.log(`${s.id}  [${s.status}]  ${s.events} events  ${s.started}`);
  });

journalCmd.command("show").description("Print one session's events").argument("<id>", "Session ID")
  .option("--journal <path>", "Session journal", config.journalPath)
  .action(async (sessionId: string, opts: { journal: string }) => {
    const journal = new Journal(resolve(opts.journal), { lock: false });
    await journal.init();
    const events = journal.readSession(sessionId);
    if (events.length === 0) { console.log(`No events found for session ${sessionId}`); return; }
    for (const event of events) {
      console.log(formatEventLine(event));
      if (Object.keys(event.payload).length > 0) console.log(`         ${JSON.stringify(event.payload)}`);
    }
    const integrity = await journal.verifyIntegrity();
    console.log(`\nJournal integrity: ${integrity.valid ? "OK" : `BROKEN at event ${integrity.brokenAt}`}`);
  });

program.parse();
