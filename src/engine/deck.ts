import type { Card, Rank, Suit } from './types';
import type { RandomSource } from './random';
import { ok, fail, type Result } from './errors';

export const SUITS: Suit[] = ['S', 'H', 'D', 'C'];
export const RANKS: Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];

const RANK_LABELS: Partial<Record<Rank, string>> = { 11: 'J', 12: 'Q', 13: 'K', 14: 'A' };
const SUIT_SYMBOLS: Record<Suit, string> = { S: '♠', H: '♥', D: '♦', C: '♣' };

export function makeCard(r: Rank, s: Suit): Card {
  return { id: `${r}${s}`, r, s };
}

export function makeDeck(): Card[] {
  const cards: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      cards.push(makeCard(rank, suit));
    }
  }
  return cards;
}

export function shuffle(cards: Card[], rng: RandomSource): Card[] {
  const shuffled = [...cards];

  // Fisher-Yates shuffle
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }

  return shuffled;
}

export function sortCards(cards: Card[]): Card[] {
  return [...cards].sort((a, b) => {
    if (a.r !== b.r) return a.r - b.r;
    return SUITS.indexOf(a.s) - SUITS.indexOf(b.s);
  });
}

export function cardsEqual(a: Card, b: Card): boolean {
  return a.id === b.id;
}

export function findCard(cards: Card[], card: Card): number {
  return cards.findIndex(c => cardsEqual(c, card));
}

export function formatCard(card: Card): string {
  return `${RANK_LABELS[card.r] ?? card.r}${SUIT_SYMBOLS[card.s]}`;
}

export function findDuplicateCards(cards: Card[]): Card[] {
  const seen = new Set<string>();
  const duplicates: Card[] = [];
  for (const card of cards) {
    const key = `${card.r}${card.s}`;
    if (seen.has(key)) {
      duplicates.push(card);
    } else {
      seen.add(key);
    }
  }
  return duplicates;
}

export interface DrawResult {
  drawn: Card[];
  remaining: Card[];
}

// Draws up to `count` cards from the top of the pile
export function drawCards(pile: Card[], count: number): Result<DrawResult> {
  if (count <= 0) {
    return ok({ drawn: [], remaining: pile });
  }
  if (pile.length === 0) {
    return fail('EmptyDeckDraw', `Cannot draw ${count} card(s) from an empty pile`);
  }
  return ok({ drawn: pile.slice(0, count), remaining: pile.slice(count) });
}
