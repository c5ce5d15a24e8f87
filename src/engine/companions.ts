import type { Card, Companion, CompanionModifier, HandResult } from './types';

export const COMPANION_CATALOG: Record<string, Companion> = {
  fortune_teller: {
    id: 'fortune_teller',
    name: 'Fortune Teller',
    description: 'Chance-based hand abilities are 50% more likely.',
    modifier: { type: 'probability', factor: 1.5 }
  },
  berserker: {
    id: 'berserker',
    name: 'Berserker',
    description: '+2 damage per turn already fought this combat.',
    modifier: { type: 'damage-ramp', increment: 2 }
  },
  echo_mage: {
    id: 'echo_mage',
    name: 'Echo Mage',
    description: 'Discarding a single card returns a copy of it to your hand.',
    modifier: { type: 'discard-echo', discardCount: 1 }
  },
  joker: {
    id: 'joker',
    name: 'The Joker',
    description: 'Adds +1 damage per card in the hand.',
    modifier: { type: 'flat-per-card', amount: 1 }
  },
  archon: {
    id: 'archon',
    name: 'The Archon',
    description: 'Multiplies damage by the number of cards played.',
    modifier: { type: 'card-count-multiplier' }
  },
  ruse: {
    id: 'ruse',
    name: 'The Ruse',
    description: 'Pairs and Three of a Kind deal 50% more damage.',
    modifier: { type: 'category-multiplier', categories: ['pair', 'three-of-a-kind'], factor: 1.5 }
  },
  emperor: {
    id: 'emperor',
    name: 'The Emperor',
    description: 'Straights and Flushes deal 50% more damage.',
    modifier: { type: 'category-multiplier', categories: ['straight', 'flush'], factor: 1.5 }
  },
  hierophant: {
    id: 'hierophant',
    name: 'The Hierophant',
    description: 'Four of a Kind and Straight Flushes deal 50% more damage.',
    modifier: { type: 'category-multiplier', categories: ['four-of-a-kind', 'straight-flush'], factor: 1.5 }
  },
  fool: {
    id: 'fool',
    name: 'The Fool',
    description: 'Draw +1 card each draw phase.',
    modifier: { type: 'extra-draw', count: 1 }
  },
  business_card: {
    id: 'business_card',
    name: 'The Businessman',
    description: 'Single-use: triples the damage of one hand.',
    modifier: { type: 'single-use-multiplier', factor: 3 }
  },
  blank: {
    id: 'blank',
    name: 'The Blank',
    description: 'No inherent effect.',
    modifier: { type: 'flat-per-card', amount: 0 }
  }
};

export function getCompanion(id: string): Companion | undefined {
  return COMPANION_CATALOG[id];
}

function modifiersOf<T extends CompanionModifier['type']>(
  companions: readonly Companion[],
  type: T
): Extract<CompanionModifier, { type: T }>[] {
  const found: Extract<CompanionModifier, { type: T }>[] = [];
  for (const companion of companions) {
    const modifier = companion.modifier;
    if (isModifier(modifier, type)) found.push(modifier);
  }
  return found;
}

function isModifier<T extends CompanionModifier['type']>(
  modifier: CompanionModifier,
  type: T
): modifier is Extract<CompanionModifier, { type: T }> {
  return modifier.type === type;
}

// Probability modifiers compose multiplicatively
export function probabilityFactor(companions: readonly Companion[]): number {
  return modifiersOf(companions, 'probability').reduce((factor, m) => factor * m.factor, 1);
}

// Bonus for the owner's n-th turn: increment * (n - 1) per ramp companion
export function damageRamp(companions: readonly Companion[], turn: number): number {
  const turnsFought = Math.max(0, turn - 1);
  return modifiersOf(companions, 'damage-ramp').reduce((sum, m) => sum + m.increment * turnsFought, 0);
}

export function extraDraws(companions: readonly Companion[]): number {
  return modifiersOf(companions, 'extra-draw').reduce((sum, m) => sum + m.count, 0);
}

// The card to echo back into hand, if an echo companion is triggered by the last discard
export function echoCard(companions: readonly Companion[], lastDiscard: readonly Card[] | null): Card | null {
  if (!lastDiscard || lastDiscard.length === 0) return null;
  const triggered = modifiersOf(companions, 'discard-echo').some(m => m.discardCount === lastDiscard.length);
  return triggered ? lastDiscard[lastDiscard.length - 1] : null;
}

export interface ModifiedDamage {
  damage: number;
  consumed: string[]; // single-use companion ids
}

// Damage-shaping companions, applied in roster order
export function applyDamageModifiers(
  companions: readonly Companion[],
  hand: HandResult,
  damage: number
): ModifiedDamage {
  const consumed: string[] = [];
  let total = damage;

  for (const companion of companions) {
    const modifier = companion.modifier;
    switch (modifier.type) {
      case 'flat-per-card':
        total += modifier.amount * hand.ranks.length;
        break;
      case 'card-count-multiplier':
        total *= hand.ranks.length;
        break;
      case 'category-multiplier':
        if (modifier.categories.includes(hand.category)) total *= modifier.factor;
        break;
      case 'single-use-multiplier':
        total *= modifier.factor;
        consumed.push(companion.id);
        break;
      default:
        break;
    }
  }

  return { damage: Math.floor(total), consumed };
}
