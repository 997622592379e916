export interface User {
  id: string;
  name: string;
  avatar: string | null;
  title: string;
}

export interface Badge {
  id: string;
  name: string;
  description: string;
  icon: string;
  color: string;
}

export interface LeaderboardEntry {
  user: User;
  points: number;
  level: number;
  rank: number;
}

export interface UserSummary {
  user: User;
  points: number;
  level: number;
  streak_days: number;
  badges: readonly Badge[];
  recent_actions: readonly string[];
}

export interface DemoDataset {
  users: readonly User[];
  badges: readonly Badge[];
  leaderboard: readonly LeaderboardEntry[];
  summaries: ReadonlyMap<string, UserSummary>;
}

export interface AwardAction {
  action: string;
  points: number;
}

export type DemoAcknowledgement = {
  mode: 'demo';
  message: string;
};

export type HealthStatus = {
  status: 'ok';
  mode: 'demo';
  version: string;
};

export type ConnectionStatus = 'Not Connected' | 'Connected';

export interface DiagnosticReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: ConnectionStatus;
  collections: string[];
}
