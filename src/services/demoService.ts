import { DEMO_DATASET } from '../data/demoDataset';
import { AwardAction, Badge, DemoAcknowledgement, HealthStatus, LeaderboardEntry, User, UserSummary } from '../models/types';
import { NotFoundError } from '../utils/errors';

export const USER_NOT_FOUND_MESSAGE = 'User not found in demo dataset';
export const READ_ONLY_MESSAGE = 'Read-only demo: no data was changed.';

export const getRootMessage = () => ({ message: 'Gamification Demo API running' });

export const getHealth = (version: string): HealthStatus => ({
  status: 'ok',
  mode: 'demo',
  version,
});

// Insertion order is already rank order.
export const listLeaderboard = (): readonly LeaderboardEntry[] => DEMO_DATASET.leaderboard;

export const listBadges = (): readonly Badge[] => DEMO_DATASET.badges;

export const listUsers = (): readonly User[] => DEMO_DATASET.users;

export const getUserSummary = (userId: string): UserSummary => {
  const summary = DEMO_DATASET.summaries.get(userId);
  if (!summary) throw new NotFoundError(USER_NOT_FOUND_MESSAGE);
  return summary;
};

export const awardPoints = (_action: AwardAction): DemoAcknowledgement => ({
  mode: 'demo',
  message: READ_ONLY_MESSAGE,
});
