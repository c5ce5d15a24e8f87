import type { Combatant, TarotCard, TarotKey } from './types';
import { heal } from './effects';

export const TAROT_CATALOG: Record<TarotKey, TarotCard> = {
  sun: { key: 'sun', name: 'The Sun', description: '+5 damage to the next attack' },
  moon: { key: 'moon', name: 'The Moon', description: 'Heal 10 HP' },
  tower: { key: 'tower', name: 'The Tower', description: '???' }
};

export const SUN_BONUS = 5;
export const MOON_HEAL = 10;

export interface TarotOutcome {
  bonusDamage: number;
  healed: number;
}

export function activateTarot(card: TarotCard, owner: Combatant): TarotOutcome {
  switch (card.key) {
    case 'sun':
      return { bonusDamage: SUN_BONUS, healed: 0 };
    case 'moon':
      return { bonusDamage: 0, healed: heal(owner, MOON_HEAL) };
    case 'tower':
      return { bonusDamage: 0, healed: 0 };
  }
}
