#!/usr/bin/env node
/**
 * SQL Coach entry point.
 *
 * Wires config, logging, the curriculum, the dataset and the session
 * together, then runs the read-eval-print loop until quit, Ctrl+C or EOF.
 */

import * as readline from "readline";
import { parseCommand } from "./cli/command-parser";
import { CommandHandler, type Output } from "./cli/commands";
import { Renderer } from "./cli/renderer";
import { loadCurriculum } from "./core/curriculum";
import { SessionManager } from "./core/session-manager";
import { SqlJsQueryExecutor } from "./db/query-executor";
import { JsonProgressStore } from "./storage/progress-store";
import { ConfigManager } from "./utils/config";
import { FileLogSink, Logger } from "./utils/logger";

async function main(): Promise<void> {
  const config = await new ConfigManager().loadConfig();
  const logger = new Logger(new FileLogSink(config.logFile), config.logLevel);
  logger.info("SQL Coach starting", { dataDir: config.dataDir });

  const curriculum = await loadCurriculum();
  const executor = new SqlJsQueryExecutor();
  await executor.initialize();

  const renderer = new Renderer({ color: config.color, maxColumnWidth: config.maxColumnWidth });
  const output: Output = {
    write: (text) => { process.stdout.write(`\n${text}\n`); },
    clear: () => { console.clear(); },
  };

  const session = new SessionManager(
    curriculum,
    executor,
    new JsonProgressStore(config.progressFile),
    logger,
    config.tolerance,
  );
  const persistWarning = session.onPersistFailure(() => {
    output.write(renderer.notice("Warning: progress could not be saved. Progress from this session may be lost."));
  });
  await session.start();

  const handler = new CommandHandler(session, curriculum, executor, renderer, output, logger);
  output.clear();
  handler.welcome();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt(renderer.prompt());
  rl.on("SIGINT", () => rl.close());

  try {
    rl.prompt();
    for await (const line of rl) {
      if (!(await handler.handle(parseCommand(line)))) {
        break;
      }
      rl.prompt();
    }
  } finally {
    rl.close();
    persistWarning.dispose();
    const saved = await session.persist();
    output.write(renderer.goodbye(saved));
    executor.close();
    logger.info("SQL Coach stopped");
  }
}

main().catch((err: unknown) => {
  console.error("[sql-coach] Fatal:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
