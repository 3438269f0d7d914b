import { describe, expect, it } from 'vitest';
import { makeMember, period } from '../testing/fixtures.js';
import {
  catalogAchievements,
  catalogBadges,
  evaluateAchievements,
  evaluateBadges,
  evaluateMember,
} from './badges.js';

const NOW = new Date('2026-03-04T12:00:00.000Z');
const LATER = new Date('2026-03-05T12:00:00.000Z');

function unlockedKeys(items: readonly { key: string; is_unlocked: boolean }[]): string[] {
  return items.filter((b) => b.is_unlocked).map((b) => b.key);
}

describe('evaluateBadges', () => {
  it('unlocks "10K Steps" at 12 500 steps', () => {
    const result = evaluateBadges(catalogBadges(new Map()), { steps: 12_500 }, NOW);

    const tenK = result.items.find((b) => b.key === 'STEPS_10K');
    expect(tenK).toMatchObject({ name: '10K Steps', is_unlocked: true, unlocked_at: NOW.toISOString() });
    expect(result.unlocked.map((b) => b.key)).toEqual(['STEPS_5K', 'STEPS_10K']);
  });

  it('leaves "10K Steps" locked at 9 999 steps', () => {
    const result = evaluateBadges(catalogBadges(new Map()), { steps: 9_999 }, NOW);

    const tenK = result.items.find((b) => b.key === 'STEPS_10K');
    expect(tenK).toMatchObject({ is_unlocked: false, unlocked_at: null });
    expect(result.unlocked.map((b) => b.key)).toEqual(['STEPS_5K']);
  });

  it('treats the threshold as inclusive', () => {
    const result = evaluateBadges(catalogBadges(new Map()), { steps: 10_000 }, NOW);
    expect(unlockedKeys(result.items)).toEqual(['STEPS_5K', 'STEPS_10K']);
  });

  it('is a no-op when re-run on its own output', () => {
    const first = evaluateBadges(catalogBadges(new Map()), { steps: 12_500 }, NOW);
    const second = evaluateBadges(first.items, { steps: 12_500 }, LATER);

    expect(second.unlocked).toEqual([]);
    expect(second.items).toEqual(first.items);
  });

  it('keeps a badge unlocked, with its first timestamp, after the metric drops', () => {
    const first = evaluateBadges(catalogBadges(new Map()), { steps: 12_500 }, NOW);
    const second = evaluateBadges(first.items, { steps: 0 }, LATER);

    expect(second.items.find((b) => b.key === 'STEPS_10K')?.unlocked_at).toBe(NOW.toISOString());
  });

  it('counts missing metrics as zero', () => {
    const result = evaluateBadges(catalogBadges(new Map()), {}, NOW);
    expect(result.unlocked).toEqual([]);
  });

  it('does not mutate the badges it was given', () => {
    const badges = catalogBadges(new Map());
    evaluateBadges(badges, { steps: 50_000 }, NOW);
    expect(unlockedKeys(badges)).toEqual([]);
  });
});

describe('evaluateAchievements', () => {
  it('reports partial progress towards locked achievements', () => {
    const result = evaluateAchievements(
      catalogAchievements(new Map()),
      { workouts_completed: 0, streak_days: 3, goal_days: 2 },
      NOW,
    );

    expect(result.unlocked).toEqual([]);
    expect(result.items.map((a) => [a.key, a.progress])).toEqual([
      ['FIRST_STEPS', 0],
      ['STREAK_MASTER', 3 / 7],
      ['GOAL_CRUSHER', 0.4],
    ]);
  });

  it('unlocks at the threshold with full progress', () => {
    const result = evaluateAchievements(catalogAchievements(new Map()), { workouts_completed: 1 }, NOW);

    expect(result.unlocked).toHaveLength(1);
    expect(result.unlocked[0]).toMatchObject({
      key: 'FIRST_STEPS',
      is_unlocked: true,
      unlocked_at: NOW.toISOString(),
      progress: 1,
    });
  });
});

describe('evaluateMember', () => {
  it('checks badges and achievements against the member snapshot', () => {
    const member = makeMember({
      metrics: { today: period({ steps: 20_000 }), weekly: period(), monthly: period() },
      streak: { current: 7, best: 7, goal_days: 0 },
    });

    const { member: evaluated, unlocked } = evaluateMember(member, NOW);

    expect(unlocked.map((b) => b.key)).toEqual([
      'STEPS_5K',
      'STEPS_10K',
      'STEPS_20K',
      'STREAK_7',
      'STREAK_MASTER',
    ]);
    expect(unlockedKeys(evaluated.achievements)).toEqual(['STREAK_MASTER']);
  });
});

describe('catalog merge', () => {
  it('lists every catalog badge with the stored unlock state', () => {
    const badges = catalogBadges(new Map([['SLEEP_8H', NOW.toISOString()]]));

    expect(badges).toHaveLength(8);
    expect(unlockedKeys(badges)).toEqual(['SLEEP_8H']);
  });

  it('forces full progress on unlocked achievements', () => {
    const achievements = catalogAchievements(
      new Map([
        ['FIRST_STEPS', { progress: 0.2, unlocked_at: NOW.toISOString() }],
        ['GOAL_CRUSHER', { progress: 0.6, unlocked_at: null }],
      ]),
    );

    expect(achievements.map((a) => [a.key, a.progress])).toEqual([
      ['FIRST_STEPS', 1],
      ['STREAK_MASTER', 0],
      ['GOAL_CRUSHER', 0.6],
    ]);
  });
});
