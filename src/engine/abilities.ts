import type { Card, Combatant, Companion, HandCategory, HandResult, Instruction } from './types';
import type { RandomSource } from './random';
import { DEFAULT_RULES, type CombatRules } from './config';
import { baseDamage, finalMultiplier, gateChance } from './scoring';
import { createEffect } from './effects';
import { applyDamageModifiers, damageRamp, echoCard, probabilityFactor } from './companions';

interface AbilityContext {
  damage: number;
  defender: Combatant;
  rng: RandomSource;
  rules: CombatRules;
  chanceFactor: number;
}

type AbilityGenerator = (ctx: AbilityContext) => Instruction[];

const stunChance: AbilityGenerator = ({ rng, rules, chanceFactor }) =>
  rng() < gateChance(rules.stunChance, chanceFactor)
    ? [{ type: 'apply-effect', target: 'defender', effect: createEffect('stun', 0, rules.durations.stun, 'high-card') }]
    : [];

const healHalf: AbilityGenerator = ({ damage }) => [
  { type: 'heal', target: 'attacker', amount: Math.floor(damage / 2) }
];

// Poisons both sides; the attacker takes the smaller share
const poisonBoth: AbilityGenerator = ({ damage, rules }) => {
  const perTurn = Math.max(rules.poisonFloor, Math.floor(damage / rules.poisonDivisor));
  const selfPerTurn = Math.floor(perTurn * rules.selfPoisonRatio);
  const duration = rules.durations.poison;
  return [
    { type: 'apply-effect', target: 'defender', effect: createEffect('poison', perTurn, duration, 'three-of-a-kind') },
    { type: 'apply-effect', target: 'attacker', effect: createEffect('poison', selfPerTurn, duration, 'three-of-a-kind') }
  ];
};

const activateItems: AbilityGenerator = () => [{ type: 'activate-items', target: 'attacker' }];

const damageBuff: AbilityGenerator = ({ rules }) => [
  {
    type: 'apply-effect',
    target: 'attacker',
    effect: createEffect('damage-buff', rules.straightBuffPercent, rules.durations['damage-buff'], 'straight')
  }
];

const shield: AbilityGenerator = ({ rules }) => [
  { type: 'apply-effect', target: 'attacker', effect: createEffect('shield', rules.flushShield, rules.durations.shield, 'flush') }
];

const damageReduction: AbilityGenerator = ({ rules }) => [
  {
    type: 'apply-effect',
    target: 'attacker',
    effect: createEffect('damage-reduction', rules.fullHouseReductionPercent, rules.durations['damage-reduction'], 'full-house')
  }
];

const extraDiscard: AbilityGenerator = () => [{ type: 'discard-limit', target: 'attacker', delta: 1 }];

const maxHealthStrike: AbilityGenerator = ({ defender, rng, rules }) => {
  const percent = rng() * rules.flushFiveMaxPercent;
  return [{ type: 'damage', target: 'defender', amount: Math.floor(defender.maxHealth * percent / 100), source: 'flush-five' }];
};

const PAIR = [healHalf];
const THREE_OF_A_KIND = [poisonBoth];
const FOUR_OF_A_KIND = [activateItems];
const FLUSH = [shield];
const FULL_HOUSE = [damageReduction];

// Two Pair and Royal Flush act on the hit itself (see resolveAbility)
const ABILITIES: Record<HandCategory, AbilityGenerator[]> = {
  'high-card': [stunChance],
  'pair': PAIR,
  'two-pair': [],
  'three-of-a-kind': THREE_OF_A_KIND,
  'straight': [damageBuff],
  'flush': FLUSH,
  'full-house': FULL_HOUSE,
  'four-of-a-kind': FOUR_OF_A_KIND,
  'straight-flush': [extraDiscard],
  'royal-flush': [],
  'five-of-a-kind': [...PAIR, ...THREE_OF_A_KIND, ...FOUR_OF_A_KIND],
  'flush-house': [...FLUSH, ...FULL_HOUSE],
  'flush-five': [maxHealthStrike]
};

const DESCRIPTIONS: Record<HandCategory, string> = {
  'high-card': '30% chance to stun enemy',
  'pair': 'Heal for half damage dealt',
  'two-pair': '50% chance for double damage',
  'three-of-a-kind': 'Poison both players',
  'straight': '30% damage buff next attack',
  'flush': '30 HP shield',
  'full-house': '30% damage reduction',
  'four-of-a-kind': 'Activate all tarot cards',
  'straight-flush': 'Discard +1',
  'royal-flush': '4x damage multiplier',
  'five-of-a-kind': 'Pair + Three of a Kind + Four of a Kind abilities',
  'flush-house': 'Flush + Full House abilities',
  'flush-five': '0-20% max HP damage to enemy'
};

export function describeAbility(category: HandCategory): string {
  return DESCRIPTIONS[category];
}

export interface ResolveOptions {
  rules?: CombatRules;
  lastDiscard?: readonly Card[] | null;
  bonusDamage?: number;
}

/**
 * Turns a classified hand into instructions for the caller to apply.
 *
 * Damage: face values x category multiplier, then damage companions, the Two
 * Pair double-damage gate, the final multiplier (Royal Flush), and finally the
 * flat bonuses (per-turn ramp, pending tarot bonus). Random draws happen in a
 * fixed order: Two Pair gate, category abilities, nothing else.
 *
 * Never mutates the combatants.
 */
export function resolveAbility(
  hand: HandResult,
  attacker: Combatant,
  defender: Combatant,
  companions: readonly Companion[],
  rng: RandomSource,
  options: ResolveOptions = {}
): Instruction[] {
  const rules = options.rules ?? DEFAULT_RULES;
  const chanceFactor = probabilityFactor(companions);

  const modified = applyDamageModifiers(companions, hand, baseDamage(hand));
  let damage = modified.damage;
  if (hand.category === 'two-pair' && rng() < gateChance(rules.doubleDamageChance, chanceFactor)) {
    damage *= 2;
  }
  damage *= finalMultiplier(hand.category, rules);
  damage += damageRamp(companions, attacker.turn) + (options.bonusDamage ?? 0);

  const instructions: Instruction[] = [{ type: 'damage', target: 'defender', amount: damage, source: 'hand' }];

  const ctx: AbilityContext = { damage, defender, rng, rules, chanceFactor };
  for (const generate of ABILITIES[hand.category]) {
    instructions.push(...generate(ctx));
  }

  const echoed = echoCard(companions, options.lastDiscard ?? null);
  if (echoed) {
    instructions.push({ type: 'hand-mutation', target: 'attacker', mutation: { kind: 'add-card', card: echoed } });
  }

  for (const companionId of modified.consumed) {
    instructions.push({ type: 'consume-companion', companionId });
  }

  return instructions;
}
