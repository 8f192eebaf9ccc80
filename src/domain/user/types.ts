// Domain layer: User (trainer) types
// Pure TypeScript interfaces for player state

/**
 * Player account, keyed by the chat platform's user id
 */
export interface User {
  id: string;
  username?: string;
  trainerLevel: number;          // 1..100
  experience: number;            // carry-over counter toward next trainer level
  coins: number;                 // never negative
  dailyStreak: number;
  lastDailyClaimAt: number | null;
  battlesWon: number;
  battlesLost: number;
  creaturesCaught: number;
  activeTeam: string[];          // ordered creature ids, at most MAX_TEAM_SIZE
  inventory: Record<string, number>;
  createdAt: number;
  revision: number;
}

export interface NewUserDefaults {
  startingCoins: number;
  startingInventory: Record<string, number>;
}

export const MAX_TEAM_SIZE = 6;

export type TeamUpdateOutcome =
  | { status: 'UPDATED'; user: User }
  | { status: 'NOT_FOUND' }
  | { status: 'NOT_OWNED'; creatureIds: string[] };

export const LEADERBOARD_CATEGORIES = ['LEVEL', 'CREATURES', 'WINS', 'COINS'] as const;

export type LeaderboardCategory = (typeof LEADERBOARD_CATEGORIES)[number];

/**
 * One ranked row; `value` is the figure the category sorts on
 * (trainer level, creatures owned, battles won or coins)
 */
export interface LeaderboardEntry {
  rank: number;
  userId: string;
  username?: string;
  value: number;
}
