import { describe, expect, it } from "vitest";
import {
  BlackjackSession,
  DEFAULT_TABLE,
  DealerMimicStrategy,
  MemoryRoundLog,
  RoundLog,
  RoundLogWriteError,
  Shoe,
  TableConfig,
  bestTotal,
  createLogger,
  isBust,
} from "../core";
import { cards, stacked, stackedWithReserve } from "./helpers";

const logger = createLogger({ level: "silent" });

function sessionWith(shoes: Shoe[], overrides: Partial<TableConfig> = {}, roundLog: RoundLog = new MemoryRoundLog()) {
  let built = 0;
  const session = new BlackjackSession({
    config: { ...DEFAULT_TABLE, ...overrides },
    logger,
    roundLog,
    createShoe: () => {
      const shoe = shoes[built];
      built += 1;
      if (shoe === undefined) throw new Error("test ran out of shoes");
      return shoe;
    },
  });
  return { session, builds: () => built };
}

describe("session accounting", () => {
  it("books a natural blackjack", () => {
    const log = new MemoryRoundLog();
    const { session } = sessionWith([stackedWithReserve("AS", "9D", "KH", "7C")], {}, log);
    session.playRound();
    expect(session.lastResult).toBe("playerBlackjack");
    expect(session.bankroll).toBe(1015);
    expect(session.wins).toBe(1);
    expect(session.gamesPlayed).toBe(1);
    expect(log.blocks).toEqual([
      "*** Game 1 ***\nPlayer's hand: A♠, K♥ (Total: 21)\nDealer shows: 9♦\nBlackjack! Player wins!\n",
    ]);
  });

  it("books a surrender as a half-bet loss", () => {
    const { session } = sessionWith([stackedWithReserve("10S", "10D", "6H", "7C")]);
    session.playRound();
    expect(session.lastResult).toBe("surrender");
    expect(session.bankroll).toBe(995);
    expect(session.losses).toBe(1);
    expect(session.wins + session.pushes).toBe(0);
  });

  it("books a player bust without a dealer turn", () => {
    const log = new MemoryRoundLog();
    const { session } = sessionWith([stackedWithReserve("10S", "9D", "2H", "7C", "4C", "6D")], {}, log);
    const round = session.playRound();
    expect(round.dealerHand.cards).toHaveLength(2);
    expect(session.lastResult).toBe("dealerWin");
    expect(session.losses).toBe(1);
    expect(session.bankroll).toBe(990);
    expect(log.blocks[0]).toBe(
      [
        "*** Game 1 ***",
        "Player's hand: 10♠, 2♥ (Total: 12)",
        "Dealer shows: 9♦",
        "Player hits: 4♣ (Total: 16)",
        "Player hits: 6♦ (Total: 22)",
        "Player busts!",
        "Dealer wins!",
        "",
      ].join("\n")
    );
  });

  it("numbers games in the log", () => {
    const log = new MemoryRoundLog();
    const { session } = sessionWith(
      [stackedWithReserve("10S", "10D", "9H", "9C", "10S", "10D", "9H", "9C")],
      {},
      log
    );
    session.playRound();
    session.playRound();
    expect(session.pushes).toBe(2);
    expect(log.blocks[1].startsWith("*** Game 2 ***\n")).toBe(true);
  });

  it("exposes a snapshot of the counters", () => {
    const { session } = sessionWith([stackedWithReserve("AS", "9D", "KH", "7C")]);
    session.playRound();
    expect(session.snapshot()).toEqual({
      lastResult: "playerBlackjack",
      bankroll: 1015,
      betAmount: 10,
      gamesPlayed: 1,
      wins: 1,
      losses: 0,
      pushes: 0,
    });
  });
});

describe("reshuffling", () => {
  it("starts a round on a fresh shoe once fewer than 15 cards remain", () => {
    const short = Shoe.fromCards(cards("2C", "3C", "4C", "5C", "6C", "7C", "8C", "9C", "10C", "JC", "QC", "KC", "AC", "2D"));
    const { session, builds } = sessionWith([short, Shoe.build(6)]);
    expect(short.remaining()).toBe(14);

    const round = session.playRound();
    expect(builds()).toBe(2);
    expect(session.shoeRemaining()).toBe(308);
    expect(round.events[0]).toEqual({ type: "shuffle" });
    expect(round.result).toBe("push");
  });

  it("keeps the shoe at exactly 15 cards", () => {
    const shoe = stacked("10S", "10D", "9H", "9C", "2C", "2C", "2C", "2C", "2C", "2C", "2C", "2C", "2C", "2C", "2C");
    const { session, builds } = sessionWith([shoe]);
    session.playRound();
    expect(builds()).toBe(1);
    expect(session.shoeRemaining()).toBe(11);
  });

  it("writes the reshuffle into the round log", () => {
    const log = new MemoryRoundLog();
    const { session } = sessionWith([Shoe.fromCards([]), Shoe.build(6)], {}, log);
    session.playRound();
    expect(log.blocks[0].split("\n").slice(0, 2)).toEqual(["Reshuffling shoe.", "*** Game 1 ***"]);
  });
});

describe("batches and reset", () => {
  const dealerBlackjacks = (rounds: number) =>
    stackedWithReserve(...Array.from({ length: rounds }, () => ["10S", "AH", "7S", "KH"]).flat());

  it("stops once the bankroll cannot cover the bet", () => {
    const { session } = sessionWith([dealerBlackjacks(10)], { initialBankroll: 25 });
    const summary = session.playRounds(10);
    expect(summary).toEqual({
      played: 2,
      stoppedForFunds: true,
      net: -20,
      evPerRound: -10,
      stdevPerRound: 0,
    });
    expect(session.bankroll).toBe(5);
    expect(session.canPlay()).toBe(false);
    expect(session.losses).toBe(2);
  });

  it("plays the full batch when funds allow", () => {
    const { session } = sessionWith([dealerBlackjacks(5)]);
    const summary = session.playRounds(3);
    expect(summary.played).toBe(3);
    expect(summary.stoppedForFunds).toBe(false);
    expect(session.gamesPlayed).toBe(3);
  });

  it("reset restores the bankroll and leaves the shoe alone", () => {
    const { session, builds } = sessionWith([stackedWithReserve("AS", "9D", "KH", "7C")]);
    session.playRound();
    const remaining = session.shoeRemaining();
    session.reset();
    expect(session.snapshot()).toEqual({
      lastResult: null,
      bankroll: 1000,
      betAmount: 10,
      gamesPlayed: 0,
      wins: 0,
      losses: 0,
      pushes: 0,
    });
    expect(session.shoeRemaining()).toBe(remaining);
    expect(builds()).toBe(1);
  });
});

describe("round log failures", () => {
  class BrokenLog implements RoundLog {
    readonly target = "broken.log";
    append(): void {
      throw new Error("disk full");
    }
  }

  it("surfaces the write error after booking the round", () => {
    const { session } = sessionWith([stackedWithReserve("AS", "9D", "KH", "7C")], {}, new BrokenLog());
    let caught: unknown;
    try {
      session.playRound();
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(RoundLogWriteError);
    if (!(caught instanceof RoundLogWriteError)) return;
    expect(caught.message).toBe("Failed to append round to broken.log: disk full");
    expect(caught.round?.result).toBe("playerBlackjack");
    expect(session.gamesPlayed).toBe(1);
    expect(session.bankroll).toBe(1015);
  });
});

describe("simulated sessions", () => {
  it("keeps the dealer at 17 or better and every round in one counter", () => {
    const session = new BlackjackSession({
      config: { ...DEFAULT_TABLE, initialBankroll: 1_000_000, seed: 2024 },
      logger,
      roundLog: new MemoryRoundLog(),
    });
    for (let i = 0; i < 400; i += 1) {
      const round = session.playRound();
      const natural = !round.events.some((e) => e.type === "action");
      const playerOut = round.result === "surrender" || isBust(round.playerHand);
      if (!natural && !playerOut) {
        expect(bestTotal(round.dealerHand)).toBeGreaterThanOrEqual(17);
      }
    }
    expect(session.gamesPlayed).toBe(400);
    expect(session.wins + session.losses + session.pushes).toBe(400);
  });

  it("replays the same outcomes from the same seed", () => {
    const run = () => {
      const session = new BlackjackSession({
        config: { ...DEFAULT_TABLE, seed: 77 },
        logger,
        roundLog: new MemoryRoundLog(),
        strategy: new DealerMimicStrategy(),
      });
      session.playRounds(50);
      return session.snapshot();
    };
    expect(run()).toEqual(run());
  });
});
