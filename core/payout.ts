import { GameResult } from "./types";

const MULTIPLIERS: Record<GameResult, number> = {
  playerWin: 1,
  dealerWin: -1,
  push: 0,
  playerBlackjack: 1.5,
  surrender: -0.5,
  doubledWin: 2,
  doubledLose: -2,
};

/** Change in bankroll for a settled round at the given stake. */
export function payout(result: GameResult, bet: number): number {
  return bet * MULTIPLIERS[result];
}

export function isWin(result: GameResult): boolean {
  return result === "playerWin" || result === "playerBlackjack" || result === "doubledWin";
}

export function isLoss(result: GameResult): boolean {
  return result === "dealerWin" || result === "doubledLose" || result === "surrender";
}
