import type { HandCategory, StatusEffectKind } from './types';

export interface CombatRules {
  multipliers: Record<HandCategory, number>;
  finalMultipliers: Partial<Record<HandCategory, number>>;
  durations: Record<StatusEffectKind, number>;
  stunChance: number;
  doubleDamageChance: number;
  poisonFloor: number;
  poisonDivisor: number;
  selfPoisonRatio: number;
  straightBuffPercent: number;
  flushShield: number;
  fullHouseReductionPercent: number;
  flushFiveMaxPercent: number;
  handSize: number;
  discardsPerTurn: number;
  allowWheel: boolean;
  reshuffleDiscards: boolean;
}

export type RuleOverrides = Partial<Omit<CombatRules, 'multipliers' | 'finalMultipliers' | 'durations'>> & {
  multipliers?: Partial<Record<HandCategory, number>>;
  finalMultipliers?: Partial<Record<HandCategory, number>>;
  durations?: Partial<Record<StatusEffectKind, number>>;
};

export const DEFAULT_RULES: CombatRules = {
  multipliers: {
    'high-card': 1,
    'pair': 2,
    'two-pair': 3,
    'three-of-a-kind': 4,
    'straight': 5,
    'flush': 6,
    'full-house': 7,
    'four-of-a-kind': 8,
    'straight-flush': 10,
    'royal-flush': 10, // x4 more through finalMultipliers
    'five-of-a-kind': 40,
    'flush-house': 35,
    'flush-five': 100
  },
  finalMultipliers: { 'royal-flush': 4 },
  durations: {
    'stun': 1,
    'heal': 0,
    'damage-buff': 1,
    'shield': 3,
    'damage-reduction': 3,
    'poison': 3
  },
  stunChance: 0.3,
  doubleDamageChance: 0.5,
  poisonFloor: 3,
  poisonDivisor: 10,
  selfPoisonRatio: 0.5,
  straightBuffPercent: 30,
  flushShield: 30,
  fullHouseReductionPercent: 30,
  flushFiveMaxPercent: 20,
  handSize: 8,
  discardsPerTurn: 4,
  allowWheel: false,
  reshuffleDiscards: true
};

export function resolveRules(overrides: RuleOverrides = {}): CombatRules {
  return {
    ...DEFAULT_RULES,
    ...overrides,
    multipliers: { ...DEFAULT_RULES.multipliers, ...overrides.multipliers },
    finalMultipliers: { ...DEFAULT_RULES.finalMultipliers, ...overrides.finalMultipliers },
    durations: { ...DEFAULT_RULES.durations, ...overrides.durations }
  };
}
