import { isLoss, isWin } from "./payout";
import { GameResult, SessionSnapshot } from "./types";

export interface RunningStats {
  count: number;
  mean: number;
  m2: number;
}

export function createRunningStats(): RunningStats {
  return { count: 0, mean: 0, m2: 0 };
}

// Welford's online update.
export function push(stats: RunningStats, value: number) {
  stats.count += 1;
  const delta = value - stats.mean;
  stats.mean += delta / stats.count;
  const delta2 = value - stats.mean;
  stats.m2 += delta * delta2;
}

export function variance(stats: RunningStats): number {
  if (stats.count < 2) return 0;
  return stats.m2 / (stats.count - 1);
}

export function stdev(stats: RunningStats): number {
  return Math.sqrt(variance(stats));
}

export interface SessionStats extends SessionSnapshot {
  initialBankroll: number;
}

export function createSessionStats(initialBankroll: number, betAmount: number): SessionStats {
  return {
    lastResult: null,
    bankroll: initialBankroll,
    betAmount,
    gamesPlayed: 0,
    wins: 0,
    losses: 0,
    pushes: 0,
    initialBankroll,
  };
}

/** Books one settled round: exactly one outcome counter moves. */
export function recordResult(stats: SessionStats, result: GameResult, delta: number): void {
  stats.gamesPlayed += 1;
  if (isWin(result)) {
    stats.wins += 1;
  } else if (isLoss(result)) {
    stats.losses += 1;
  } else {
    stats.pushes += 1;
  }
  stats.lastResult = result;
  stats.bankroll += delta;
}

export function resetStats(stats: SessionStats): void {
  stats.lastResult = null;
  stats.bankroll = stats.initialBankroll;
  stats.gamesPlayed = 0;
  stats.wins = 0;
  stats.losses = 0;
  stats.pushes = 0;
}

export function snapshotOf(stats: SessionStats): SessionSnapshot {
  return {
    lastResult: stats.lastResult,
    bankroll: stats.bankroll,
    betAmount: stats.betAmount,
    gamesPlayed: stats.gamesPlayed,
    wins: stats.wins,
    losses: stats.losses,
    pushes: stats.pushes,
  };
}
