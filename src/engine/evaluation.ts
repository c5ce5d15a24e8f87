import type { Card, HandCategory, HandResult } from './types';
import { sortCards } from './deck';
import { DEFAULT_RULES, type CombatRules } from './config';
import { ok, fail, type Result } from './errors';

export const HAND_CATEGORIES: HandCategory[] = [
  'high-card',
  'pair',
  'two-pair',
  'three-of-a-kind',
  'straight',
  'flush',
  'full-house',
  'four-of-a-kind',
  'straight-flush',
  'royal-flush',
  'five-of-a-kind',
  'flush-house',
  'flush-five'
];

export const CATEGORY_NAMES: Record<HandCategory, string> = {
  'high-card': 'High Card',
  'pair': 'Pair',
  'two-pair': 'Two Pair',
  'three-of-a-kind': 'Three of a Kind',
  'straight': 'Straight',
  'flush': 'Flush',
  'full-house': 'Full House',
  'four-of-a-kind': 'Four of a Kind',
  'straight-flush': 'Straight Flush',
  'royal-flush': 'Royal Flush',
  'five-of-a-kind': 'Five of a Kind',
  'flush-house': 'Flush House',
  'flush-five': 'Flush Five'
};

export const MIN_HAND_SIZE = 1;
export const MAX_HAND_SIZE = 5;

export interface ClassifyOptions {
  rules?: CombatRules;
}

// Positive when `a` is the stronger category
export function compareCategories(a: HandCategory, b: HandCategory): number {
  return HAND_CATEGORIES.indexOf(a) - HAND_CATEGORIES.indexOf(b);
}

function rankCounts(cards: Card[]): number[] {
  const counts = new Map<number, number>();
  cards.forEach(c => counts.set(c.r, (counts.get(c.r) || 0) + 1));
  return Array.from(counts.values()).sort((a, b) => b - a);
}

function isFlush(cards: Card[]): boolean {
  if (cards.length !== 5) return false;
  const suit = cards[0].s;
  return cards.every(c => c.s === suit);
}

// Expects cards sorted ascending
function isStraight(sorted: Card[], allowWheel: boolean): boolean {
  if (sorted.length !== 5) return false;

  const sequential = sorted.every((c, i) => i === 0 || c.r === sorted[i - 1].r + 1);
  if (sequential) return true;

  // A-2-3-4-5 with the Ace playing low
  return allowWheel &&
    sorted[0].r === 2 && sorted[1].r === 3 &&
    sorted[2].r === 4 && sorted[3].r === 5 && sorted[4].r === 14;
}

function isRoyal(sorted: Card[]): boolean {
  return sorted[0].r === 10 && sorted[sorted.length - 1].r === 14;
}

export function getHandCategory(cards: Card[], allowWheel = false): HandCategory {
  const sorted = sortCards(cards);
  const counts = rankCounts(sorted);
  const five = sorted.length === 5;
  const flush = isFlush(sorted);
  const straight = isStraight(sorted, allowWheel);
  const fullHouse = five && counts[0] === 3 && counts[1] === 2;

  // Most specific first: the composite categories are supersets of the standard ones
  if (five && counts[0] === 5 && flush) return 'flush-five';
  if (fullHouse && flush) return 'flush-house';
  if (five && counts[0] === 5) return 'five-of-a-kind';
  if (straight && flush && isRoyal(sorted)) return 'royal-flush';
  if (straight && flush) return 'straight-flush';
  if (counts[0] === 4) return 'four-of-a-kind';
  if (fullHouse) return 'full-house';
  if (flush) return 'flush';
  if (straight) return 'straight';
  if (counts[0] === 3) return 'three-of-a-kind';
  if (counts[0] === 2 && counts[1] === 2) return 'two-pair';
  if (counts[0] === 2) return 'pair';
  return 'high-card';
}

/**
 * Classifies a played selection of 1..5 cards.
 *
 * Input is assumed duplicate-free; deck integrity is checked when a session is
 * created, not here.
 */
export function classify(cards: Card[], options: ClassifyOptions = {}): Result<HandResult> {
  if (cards.length < MIN_HAND_SIZE || cards.length > MAX_HAND_SIZE) {
    return fail('InvalidHandSize', `A hand needs ${MIN_HAND_SIZE}-${MAX_HAND_SIZE} cards, got ${cards.length}`);
  }

  const rules = options.rules ?? DEFAULT_RULES;
  const category = getHandCategory(cards, rules.allowWheel);

  return ok({
    category,
    multiplier: rules.multipliers[category],
    ranks: cards.map(c => c.r).sort((a, b) => b - a)
  });
}
