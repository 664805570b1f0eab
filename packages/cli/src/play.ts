import { v4 as uuid } from "uuid";
import type { CheckpointTable, Logger, SessionEventSink } from "@ghostwalk/schemas";
import { CHECKPOINTS, installHooks, loadCheckpointTable } from "@ghostwalk/engine";
import { Journal } from "@ghostwalk/journal";
import type { Connection, StreamLinkOptions } from "@ghostwalk/protocol";
import { SyncClient, connect } from "@ghostwalk/protocol";
import { loadEngine } from "./engine-loader.js";
import { FileSaveStore } from "./save-store.js";
import { SessionDriver } from "./session-driver.js";
import { RealStatusBarWriter, StatusBar, type StatusBarWriter } from "./status-bar.js";
import { ChatInput, RealTerminalIO, type TerminalIO } from "./terminal-input.js";
import { TerminalRenderer } from "./terminal-renderer.js";

export interface PlayOptions {
  host: string;
  port: number;
  /** "scripted" or an engine adapter module. */
  engine: string;
  romPath?: string;
  savePath?: string;
  journalPath: string;
  checkpointsPath?: string;
  fast?: boolean;
  /** Player name for the scripted engine. */
  name?: string;
  logger: Logger;
}

/** Seams for tests; production uses TCP and the real terminal. */
export interface PlayDeps {
  connect?: (host: string, port: number, options: StreamLinkOptions) => Promise<Connection>;
  terminal?: TerminalIO;
  statusBarWriter?: StatusBarWriter;
  sessionId?: string;
  /** Called once everything is running; the returned session ends when `input` closes. */
  onStarted?: (session: { input: ChatInput; driver: SessionDriver; client: SyncClient }) => void;
}

export interface PlayResult {
  sessionId: string;
  playerId: number;
  framesStepped: number;
  saved: boolean;
}

/**
 * One play session from start to finish: checkpoints, journal, save file, engine,
 * relay connection, the driver loop, then an orderly shutdown that writes the save
 * back and flushes the journal.
 */
export async function runPlay(options: PlayOptions, deps: PlayDeps = {}): Promise<PlayResult> {
  const logger = options.logger;
  const table: Readonly<CheckpointTable> = options.checkpointsPath
    ? await loadCheckpointTable(options.checkpointsPath)
    : CHECKPOINTS;

  const journal = new Journal(options.journalPath, { logger });
  await journal.init();
  const sessionId = deps.sessionId ?? uuid();
  const journalSink = journal.sink(sessionId);

  const terminal = deps.terminal ?? new RealTerminalIO();
  const statusBar = new StatusBar(deps.statusBarWriter ?? new RealStatusBarWriter(), {
    relay: `${options.host}:${options.port}`,
    fast: options.fast ?? false,
  });

  // The relay going away leaves the local game running single-player
  let closing = false;
  const events: SessionEventSink = {
    record: (type, payload) => {
      journalSink.record(type, payload);
      if (type === "stream.closed" && !closing) {
        statusBar.update({ connection: "disconnected" });
        logger.warn("Lost the relay; continuing offline");
      }
    },
  };

  try {
    const saveStore = options.savePath ? new FileSaveStore(options.savePath) : null;
    const save = saveStore ? await saveStore.load() : null;
    if (save) logger.info(`Loaded save (${save.length} bytes)`);

    const loaded = await loadEngine(options.engine, {
      table,
      save,
      ...(options.romPath !== undefined ? { romPath: options.romPath } : {}),
      ...(options.name !== undefined ? { name: options.name } : {}),
    });

    const connectTo = deps.connect ?? connect;
    const { playerId, link } = await connectTo(options.host, options.port, { logger, events });
    logger.info(`Joined relay as player ${playerId}`, { session_id: sessionId });

    const client = new SyncClient({ localId: playerId, channel: link, table, logger, events });
    const uninstall = installHooks(loaded.engine, client.game, client.players, table);
    const input = new ChatInput(terminal, { fast: options.fast ?? false });
    const driver = new SessionDriver({
      engine: loaded.engine,
      client,
      input,
      renderer: new TerminalRenderer({ terminal, statusBar }),
      fast: options.fast ?? false,
      table,
      logger,
    });

    statusBar.setup();
    statusBar.update({ connection: "connected", playerId });
    input.start();
    driver.start();
    deps.onStarted?.({ input, driver, client });

    try {
      await input.closed;
    } finally {
      driver.stop();
      uninstall();
      input.close();
      statusBar.teardown();
    }

    let saved = false;
    const bytes = loaded.exportSave();
    if (bytes && saveStore) {
      await saveStore.save(bytes);
      saved = true;
      logger.info(`Saved to ${saveStore.getFilePath()}`);
    }

    closing = true;
    await link.close();
    journalSink.record("session.closed", { player_id: playerId, frames: driver.framesStepped, saved });
    return { sessionId, playerId, framesStepped: driver.framesStepped, saved };
  } finally {
    await journal.close();
  }
}
