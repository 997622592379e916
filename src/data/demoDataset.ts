import { Badge, DemoDataset, LeaderboardEntry, User, UserSummary } from '../models/types';

// Read-only, non-persistent sample data. Nothing here is ever written back.

const makeUser = (payload: Pick<User, 'id' | 'name'> & Partial<User>): User => ({
  id: payload.id,
  name: payload.name,
  avatar: payload.avatar ?? null,
  title: payload.title ?? 'Player',
});

const makeBadge = (payload: Pick<Badge, 'id' | 'name' | 'description'> & Partial<Badge>): Badge => ({
  id: payload.id,
  name: payload.name,
  description: payload.description,
  icon: payload.icon ?? 'Star',
  color: payload.color ?? '#6366F1',
});

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach(deepFreeze);
  }
  return value;
};

const users: User[] = [
  makeUser({ id: 'u_001', name: 'Alex Morgan', title: 'Sales Captain' }),
  makeUser({ id: 'u_002', name: 'Jamie Lee', title: 'Ops Strategist' }),
  makeUser({ id: 'u_003', name: 'Riley Chen', title: 'Product Ace' }),
  makeUser({ id: 'u_004', name: 'Jordan Patel', title: 'CX Pro' }),
];

const [alex, jamie, riley, jordan] = users;

const badges: Badge[] = [
  makeBadge({ id: 'b_hero', name: 'Hero', description: 'Top performer of the week', icon: 'Trophy', color: '#F59E0B' }),
  makeBadge({ id: 'b_streak', name: 'Streak', description: '7-day activity streak', icon: 'Flame', color: '#EF4444' }),
  makeBadge({ id: 'b_helper', name: 'Mentor', description: 'Helped 5 teammates', icon: 'Handshake', color: '#10B981' }),
];

const [hero, streak, helper] = badges;

const leaderboard: LeaderboardEntry[] = [
  { user: alex, points: 18250, level: 12, rank: 1 },
  { user: jamie, points: 16940, level: 11, rank: 2 },
  { user: riley, points: 15100, level: 10, rank: 3 },
  { user: jordan, points: 13320, level: 9, rank: 4 },
];

const summaries: UserSummary[] = [
  {
    user: alex,
    points: 18250,
    level: 12,
    streak_days: 8,
    badges: [hero, streak],
    recent_actions: [
      'Closed enterprise deal (+2,000)',
      'Completed onboarding quest (+300)',
      'Shared playbook with team (+100)',
    ],
  },
  {
    user: jamie,
    points: 16940,
    level: 11,
    streak_days: 6,
    badges: [streak],
    recent_actions: ['Optimized ops workflow (+500)', 'Daily check-in (+20)'],
  },
  {
    user: riley,
    points: 15100,
    level: 10,
    streak_days: 4,
    badges: [],
    recent_actions: ['Launched feature beta (+1,200)'],
  },
  {
    user: jordan,
    points: 13320,
    level: 9,
    streak_days: 2,
    badges: [helper],
    recent_actions: ['Resolved 20+ support tickets (+800)'],
  },
];

export const DEMO_DATASET: DemoDataset = deepFreeze({
  users,
  badges,
  leaderboard,
  summaries: new Map(deepFreeze(summaries).map((summary) => [summary.user.id, summary])),
});
