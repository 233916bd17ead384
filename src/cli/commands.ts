import chalk from "chalk";
import { BatchSummary, GameResult, SessionSnapshot, isWin } from "../../core";

export const DEFAULT_BATCH = 1000;

export type Command =
  | { kind: "play"; rounds: number }
  | { kind: "reset" }
  | { kind: "stats" }
  | { kind: "quit" }
  | { kind: "unknown"; input: string };

export function parseCommand(line: string): Command {
  const [word = "", arg] = line.trim().toLowerCase().split(/\s+/);
  switch (word) {
    case "play":
    case "p": {
      if (arg === undefined) return { kind: "play", rounds: 1 };
      const rounds = Number(arg);
      if (Number.isInteger(rounds) && rounds > 0) return { kind: "play", rounds };
      return { kind: "unknown", input: line.trim() };
    }
    case "batch":
    case "b":
      return { kind: "play", rounds: DEFAULT_BATCH };
    case "reset":
      return { kind: "reset" };
    case "stats":
    case "s":
      return { kind: "stats" };
    case "quit":
    case "exit":
    case "q":
      return { kind: "quit" };
    default:
      return { kind: "unknown", input: line.trim() };
  }
}

const RESULT_LABELS: Record<GameResult, string> = {
  playerWin: "Player Wins!",
  dealerWin: "Dealer Wins!",
  push: "Push!",
  playerBlackjack: "Player Wins with Blackjack!",
  surrender: "Player Surrendered.",
  doubledWin: "Player Wins Doubled Bet!",
  doubledLose: "Player Loses Doubled Bet!",
};

export function resultLabel(result: GameResult | null): string {
  return result === null ? "No games played yet." : `Last Game Result: ${RESULT_LABELS[result]}`;
}

const money = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
});

export function formatMoney(amount: number): string {
  return money.format(amount);
}

export function renderSnapshot(snapshot: SessionSnapshot): string {
  const last = snapshot.lastResult;
  const tone = last === null ? chalk.dim : isWin(last) ? chalk.green : last === "push" ? chalk.yellow : chalk.red;
  return [
    tone(resultLabel(last)),
    `Bankroll: ${chalk.bold(formatMoney(snapshot.bankroll))}`,
    `Games Played: ${snapshot.gamesPlayed}`,
    `Wins: ${snapshot.wins}`,
    `Losses: ${snapshot.losses}`,
    `Pushes: ${snapshot.pushes}`,
  ].join("\n");
}

export function renderBatch(summary: BatchSummary): string {
  const lines = [
    `Played ${summary.played} rounds, net ${formatMoney(summary.net)}`,
    `EV/round ${summary.evPerRound.toFixed(3)}, stdev ${summary.stdevPerRound.toFixed(3)}`,
  ];
  if (summary.stoppedForFunds) {
    lines.push(chalk.red("Insufficient bankroll to continue playing."));
  }
  return lines.join("\n");
}
