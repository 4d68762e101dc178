import type { RuleSet } from './RuleStrategy';

const HANCHAN: RuleSet = {
  id: 'hanchan',
  name: 'Hanchan (east + south)',
  gameLength: 'hanchan',
  startingScore: 25000,
  redFives: [1, 1, 1],
  openTanyao: false,
  kanDoraTiming: 'immediate',
  abortiveDraws: true,
  bustOut: true,
  autoNextHand: true,
};

const RULES: RuleSet[] = [
  HANCHAN,
  { ...HANCHAN, id: 'tonpuusen', name: 'Tonpuusen (east only)', gameLength: 'tonpuusen' },
  { ...HANCHAN, id: 'issousen', name: 'Issousen (all four winds)', gameLength: 'issousen' },
];

export function getRule(id: string | undefined | null): RuleSet {
  const key = String(id ?? '').trim().toLowerCase();
  return RULES.find((r) => r.id === key) ?? HANCHAN;
}

/** Derives a variant; the id stays the base preset's unless overridden. */
export function withOverrides(rule: RuleSet, overrides: Partial<RuleSet>): RuleSet {
  return { ...rule, ...overrides };
}
