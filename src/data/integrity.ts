import { DemoDataset } from '../models/types';
import { DatasetIntegrityError } from '../utils/errors';

const isIntAtLeast = (value: number, min: number) => Number.isInteger(value) && value >= min;

const findDuplicates = (ids: string[]) => ids.filter((id, index) => ids.indexOf(id) !== index);

/**
 * Collects every violation of the invariants the demo data is expected to
 * hold by construction: unique ids, a rank-ordered leaderboard and summaries
 * that only point at known users and badges.
 */
export const findDatasetIssues = (dataset: DemoDataset): string[] => {
  const issues: string[] = [];
  const userIds = new Set(dataset.users.map((user) => user.id));
  const badgeIds = new Set(dataset.badges.map((badge) => badge.id));

  findDuplicates(dataset.users.map((user) => user.id)).forEach((id) => issues.push(`duplicate user id ${id}`));
  findDuplicates(dataset.badges.map((badge) => badge.id)).forEach((id) => issues.push(`duplicate badge id ${id}`));

  dataset.leaderboard.forEach((entry, index) => {
    const label = `leaderboard[${index}]`;
    if (!userIds.has(entry.user.id)) issues.push(`${label} references unknown user ${entry.user.id}`);
    if (!isIntAtLeast(entry.points, 0)) issues.push(`${label} has invalid points ${entry.points}`);
    if (!isIntAtLeast(entry.level, 1)) issues.push(`${label} has invalid level ${entry.level}`);
    if (entry.rank !== index + 1) issues.push(`${label} has rank ${entry.rank}, expected ${index + 1}`);

    const previous = index > 0 ? dataset.leaderboard[index - 1] : undefined;
    if (previous && entry.points >= previous.points) {
      issues.push(`${label} has ${entry.points} points, not below rank ${previous.rank} (${previous.points})`);
    }
  });

  dataset.summaries.forEach((summary, userId) => {
    const label = `summary ${userId}`;
    if (!userIds.has(userId)) issues.push(`${label} does not match any user`);
    if (summary.user.id !== userId) issues.push(`${label} embeds user ${summary.user.id}`);
    if (!isIntAtLeast(summary.streak_days, 0)) issues.push(`${label} has invalid streak_days ${summary.streak_days}`);
    summary.badges
      .filter((badge) => !badgeIds.has(badge.id))
      .forEach((badge) => issues.push(`${label} references unknown badge ${badge.id}`));
  });

  return issues;
};

export const assertDatasetIntegrity = (dataset: DemoDataset) => {
  const issues = findDatasetIssues(dataset);
  if (issues.length) {
    throw new DatasetIntegrityError(issues);
  }
};
