import fs from "node:fs";
import { cardName } from "./card";
import { addCard, bestTotal, createHand, describeHand, isBust } from "./hand";
import { GameResult, Hand, RoundResult } from "./types";

/** Append-only sink for round transcripts. */
export interface RoundLog {
  readonly target: string;
  append(block: string): void;
}

const OUTCOME_LINES: Record<GameResult, string> = {
  playerWin: "Player wins!",
  dealerWin: "Dealer wins!",
  push: "Push!",
  playerBlackjack: "Blackjack! Player wins!",
  surrender: "Player surrenders half the bet.",
  doubledWin: "Player wins doubled bet!",
  doubledLose: "Player loses doubled bet!",
};

const INITIAL_DEALS = 4;

function withTotal(hand: Hand): string {
  return `${describeHand(hand)} (Total: ${bestTotal(hand)})`;
}

function naturalLines(result: GameResult, player: Hand, dealer: Hand): string[] {
  const playerLine = `Player's hand: ${withTotal(player)}`;
  if (result === "playerBlackjack") {
    return [playerLine, `Dealer shows: ${cardName(dealer.cards[0])}`, OUTCOME_LINES.playerBlackjack];
  }
  const verdict = result === "push" ? "Both have Blackjack! Push!" : "Blackjack! Dealer wins!";
  return [playerLine, `Dealer's hand: ${withTotal(dealer)}`, verdict];
}

/**
 * Renders a round as the human-readable block written to the round log.
 * The block is newline-terminated.
 */
export function formatRound(gameNumber: number, round: RoundResult): string {
  const lines: string[] = [];
  const player = createHand();
  const dealer = createHand();
  const isNatural = !round.events.some((event) => event.type === "action");
  let dealt = 0;
  let doubling = false;

  if (round.events.some((event) => event.type === "shuffle")) {
    lines.push("Reshuffling shoe.");
  }
  lines.push(`*** Game ${gameNumber} ***`);

  for (const event of round.events) {
    switch (event.type) {
      case "deal": {
        const hand = event.target === "player" ? player : dealer;
        addCard(hand, event.card);
        dealt += 1;
        if (dealt < INITIAL_DEALS) break;
        if (dealt === INITIAL_DEALS) {
          if (!isNatural) {
            lines.push(`Player's hand: ${withTotal(player)}`);
            lines.push(`Dealer shows: ${cardName(dealer.cards[0])}`);
          }
          break;
        }
        const drawn = `${cardName(event.card)} (Total: ${bestTotal(hand)})`;
        if (event.target === "dealer") {
          lines.push(`Dealer hits: ${drawn}`);
          if (isBust(dealer)) lines.push("Dealer busts!");
        } else if (doubling) {
          lines.push(`Player doubles down: ${drawn}`);
          doubling = false;
        } else {
          lines.push(`Player hits: ${drawn}`);
          if (isBust(player)) lines.push("Player busts!");
        }
        break;
      }
      case "action":
        if (event.action === "D" && event.phase === "first") {
          doubling = true;
        } else if (event.action === "R" && event.phase === "first") {
          lines.push("Player surrenders.");
        } else if (event.action !== "H" && event.phase === "subsequent") {
          lines.push("Player stands.");
        }
        break;
      case "splitUnsupported":
        lines.push("Player splits: not supported, standing.");
        break;
      case "result":
        if (isNatural) {
          lines.push(...naturalLines(event.result, player, dealer));
          break;
        }
        if (event.result !== "surrender" && !isBust(player) && !isBust(dealer)) {
          lines.push("Dealer stands.");
          lines.push(`Dealer's hand: ${withTotal(dealer)}`);
        }
        lines.push(OUTCOME_LINES[event.result]);
        break;
      default:
        break;
    }
  }

  return `${lines.join("\n")}\n`;
}

/** Opens, appends and closes the file once per block. */
export class FileRoundLog implements RoundLog {
  readonly target: string;

  constructor(path: string) {
    this.target = path;
  }

  append(block: string): void {
    const fd = fs.openSync(this.target, "a");
    try {
      fs.writeSync(fd, `${block}\n`);
    } finally {
      fs.closeSync(fd);
    }
  }
}

export class MemoryRoundLog implements RoundLog {
  readonly target = "memory";
  readonly blocks: string[] = [];

  append(block: string): void {
    this.blocks.push(block);
  }
}
