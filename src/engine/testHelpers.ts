import { makeCard, RANKS, SUITS } from './deck';
import type { Card } from './types';

const LABELS: Record<string, number> = { J: 11, Q: 12, K: 13, A: 14 };

// hand('10H', 'AS', '7D')
export function hand(...specs: string[]): Card[] {
  return specs.map(spec => {
    const suit = SUITS.find(s => s === spec.slice(-1));
    const label = spec.slice(0, -1);
    const rank = RANKS.find(r => r === (LABELS[label] ?? Number(label)));
    if (rank === undefined || suit === undefined) throw new Error(`bad card ${spec}`);
    return makeCard(rank, suit);
  });
}
