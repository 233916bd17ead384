import "dotenv/config";
import * as readline from "node:readline/promises";
import chalk from "chalk";
import {
  BlackjackSession,
  FileRoundLog,
  createLogger,
  loadTableConfig,
} from "../../core";
import { parseCommand, renderBatch, renderSnapshot } from "./commands";

const HELP = "Commands: play [n] | batch | reset | stats | quit";

async function main() {
  const config = loadTableConfig();
  const logger = createLogger({ level: config.logLevel, pretty: true });
  const session = new BlackjackSession({
    config,
    logger,
    roundLog: new FileRoundLog(config.logFile),
  });

  console.log(chalk.bold("Blackjack Simulator"));
  console.log(chalk.dim(`strategy: ${session.strategyName}, round log: ${config.logFile}`));
  console.log(HELP);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const command = parseCommand(await rl.question("> "));
      if (command.kind === "quit") break;
      switch (command.kind) {
        case "play":
          if (command.rounds === 1) {
            if (session.canPlay()) {
              session.playRound();
            } else {
              console.log(chalk.red("Insufficient bankroll to continue playing."));
            }
          } else {
            console.log(renderBatch(session.playRounds(command.rounds)));
          }
          console.log(renderSnapshot(session.snapshot()));
          break;
        case "reset":
          session.reset();
          console.log(renderSnapshot(session.snapshot()));
          break;
        case "stats":
          console.log(renderSnapshot(session.snapshot()));
          break;
        case "unknown":
          console.log(chalk.yellow(`Unknown command: ${command.input}`));
          console.log(HELP);
          break;
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
