import type { HandCategory, HandResult } from './types';
import { DEFAULT_RULES, type CombatRules } from './config';

export function handMultiplier(category: HandCategory, rules: CombatRules = DEFAULT_RULES): number {
  return rules.multipliers[category];
}

export function finalMultiplier(category: HandCategory, rules: CombatRules = DEFAULT_RULES): number {
  return rules.finalMultipliers[category] ?? 1;
}

// Sum of played face values times the category multiplier
export function baseDamage(hand: HandResult): number {
  const raw = hand.ranks.reduce<number>((sum, rank) => sum + rank, 0);
  return raw * hand.multiplier;
}

// Percentage modifiers round down
export function applyPercent(amount: number, percent: number): number {
  return Math.floor(amount * (100 + percent) / 100);
}

export function gateChance(baseChance: number, factor: number): number {
  return Math.min(1, baseChance * factor);
}
