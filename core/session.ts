import { PACKS_PER_SHOE, RESHUFFLE_THRESHOLD } from "./config";
import { RoundLogWriteError } from "./errors";
import { playRound } from "./game";
import { Logger } from "./logger";
import { RNG, createRng } from "./rng";
import { RoundLog, formatRound } from "./roundLog";
import { Shoe } from "./shoe";
import {
  SessionStats,
  createRunningStats,
  createSessionStats,
  push,
  recordResult,
  resetStats,
  snapshotOf,
  stdev,
} from "./stats";
import { BasicStrategy } from "./strategy";
import { BatchSummary, GameResult, RoundResult, SessionSnapshot, Strategy, TableConfig } from "./types";

export interface SessionOptions {
  config: TableConfig;
  roundLog: RoundLog;
  logger: Logger;
  strategy?: Strategy;
  rng?: RNG;
  createShoe?: () => Shoe;
}

/**
 * One player at one table: owns the shoe, the bankroll and the counters.
 * Rounds run strictly one after another.
 */
export class BlackjackSession {
  private readonly strategy: Strategy;
  private readonly roundLog: RoundLog;
  private readonly logger: Logger;
  private readonly createShoe: () => Shoe;
  private readonly stats: SessionStats;
  private shoe: Shoe;

  constructor(options: SessionOptions) {
    const rng = options.rng ?? createRng(options.config.seed);
    this.strategy = options.strategy ?? new BasicStrategy();
    this.roundLog = options.roundLog;
    this.logger = options.logger;
    this.createShoe = options.createShoe ?? (() => Shoe.shuffled(PACKS_PER_SHOE, rng));
    this.stats = createSessionStats(options.config.initialBankroll, options.config.bet);
    this.shoe = this.createShoe();
  }

  get lastResult(): GameResult | null {
    return this.stats.lastResult;
  }

  get bankroll(): number {
    return this.stats.bankroll;
  }

  get betAmount(): number {
    return this.stats.betAmount;
  }

  get gamesPlayed(): number {
    return this.stats.gamesPlayed;
  }

  get wins(): number {
    return this.stats.wins;
  }

  get losses(): number {
    return this.stats.losses;
  }

  get pushes(): number {
    return this.stats.pushes;
  }

  get strategyName(): string {
    return this.strategy.name;
  }

  shoeRemaining(): number {
    return this.shoe.remaining();
  }

  snapshot(): SessionSnapshot {
    return snapshotOf(this.stats);
  }

  canPlay(): boolean {
    return this.stats.bankroll >= this.stats.betAmount;
  }

  /**
   * Plays and books one round. Stats and bankroll are updated before the
   * transcript is written, so a failed write still leaves the outcome recorded.
   */
  playRound(): RoundResult {
    const reshuffled = this.shoe.remaining() < RESHUFFLE_THRESHOLD;
    if (reshuffled) {
      this.shoe = this.createShoe();
      this.logger.info({ cards: this.shoe.remaining() }, "reshuffled shoe");
    }

    const round = playRound(this.shoe, this.strategy, this.stats.betAmount);
    if (reshuffled) {
      round.events.unshift({ type: "shuffle" });
    }

    recordResult(this.stats, round.result, round.payout);
    const gameNumber = this.stats.gamesPlayed;
    this.logger.debug(
      { game: gameNumber, result: round.result, payout: round.payout, bankroll: this.stats.bankroll },
      "round complete"
    );

    try {
      this.roundLog.append(formatRound(gameNumber, round));
    } catch (err) {
      throw new RoundLogWriteError(this.roundLog.target, err, round);
    }
    return round;
  }

  /** Plays up to `count` rounds, stopping early once the bankroll cannot cover the bet. */
  playRounds(count: number): BatchSummary {
    const startBankroll = this.stats.bankroll;
    const perRound = createRunningStats();
    let played = 0;
    let stoppedForFunds = false;

    while (played < count) {
      if (!this.canPlay()) {
        stoppedForFunds = true;
        this.logger.warn(
          { bankroll: this.stats.bankroll, bet: this.stats.betAmount, played },
          "insufficient bankroll to continue playing"
        );
        break;
      }
      const round = this.playRound();
      push(perRound, round.payout);
      played += 1;
    }

    return {
      played,
      stoppedForFunds,
      net: this.stats.bankroll - startBankroll,
      evPerRound: perRound.count > 0 ? perRound.mean : 0,
      stdevPerRound: stdev(perRound),
    };
  }

  /** Clears counters and restores the starting bankroll. The shoe is left as it is. */
  reset(): void {
    resetStats(this.stats);
    this.logger.info({ bankroll: this.stats.bankroll }, "session reset");
  }
}
