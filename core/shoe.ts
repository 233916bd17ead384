import { createCard, RANKS, SUITS } from "./card";
import { EmptyShoeError } from "./errors";
import { RNG, randomIndex } from "./rng";
import { Card, CardSource } from "./types";

export class Shoe implements CardSource {
  private readonly stack: Card[];

  private constructor(cards: Card[]) {
    this.stack = cards;
  }

  /** Unshuffled: pack by pack, suit by suit, ranks ascending. */
  static build(packs: number): Shoe {
    const cards: Card[] = [];
    for (let p = 0; p < packs; p += 1) {
      for (const suit of SUITS) {
        for (const rank of RANKS) {
          cards.push(createCard(rank, suit));
        }
      }
    }
    return new Shoe(cards);
  }

  static shuffled(packs: number, rng: RNG): Shoe {
    const shoe = Shoe.build(packs);
    shoe.shuffle(rng);
    return shoe;
  }

  /** The last card of `cards` is dealt first. */
  static fromCards(cards: readonly Card[]): Shoe {
    return new Shoe([...cards]);
  }

  shuffle(rng: RNG): void {
    for (let i = this.stack.length - 1; i > 0; i -= 1) {
      const j = randomIndex(rng, i + 1);
      [this.stack[i], this.stack[j]] = [this.stack[j], this.stack[i]];
    }
  }

  dealOne(): Card {
    const card = this.stack.pop();
    if (card === undefined) {
      throw new EmptyShoeError();
    }
    return card;
  }

  remaining(): number {
    return this.stack.length;
  }

  cards(): Card[] {
    return [...this.stack];
  }
}
