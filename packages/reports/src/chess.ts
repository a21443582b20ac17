import {
  aggregateMatchups,
  classifyDominance,
  detectRuns,
  expandPerspectives,
  findUpsets,
  normalizeEvents,
  roundedRatio,
  summarizeRuns,
  type Event,
  type EventSchemaDescriptor,
  type NormalizeOptions,
  type OccurredAt,
} from '@seqlens/core';

/** One side of a game as returned by the chess.com archive API. */
export interface ChessSide {
  username: string;
  rating?: number | string | null;
  result?: string | null;
}

/** A raw game row from the player archives. */
export interface ChessGameRow {
  url: string;
  end_time: number | string;
  time_class?: string | null;
  time_control?: string | null;
  rated?: boolean | null;
  white: ChessSide;
  black: ChessSide;
}

export const GAME_OUTCOMES = ['win', 'loss', 'draw'] as const;

/**
 * Games become matchup events seen from white: `win` when white won, `loss`
 * when black won, `draw` otherwise. Usernames are lowercased. Duplicate URLs
 * keep the latest game.
 */
export const chessGameDescriptor: EventSchemaDescriptor = {
  domain: [...GAME_OUTCOMES],
  entityId: { from: 'white.username' },
  occurredAt: { from: 'end_time', coerce: 'epoch-seconds' },
  category: {
    kind: 'rules',
    table: {
      rules: [
        { label: 'win', when: { 'white.result': { eq: 'win' } } },
        { label: 'loss', when: { 'black.result': { eq: 'win' } } },
      ],
      otherwise: 'draw',
    },
  },
  participants: [{ from: 'white.username' }, { from: 'black.username' }],
  identifierCase: 'lower',
  attributes: {
    url: { from: 'url', coerce: 'string' },
    timeClass: { from: 'time_class', coerce: 'string' },
    firstRating: { from: 'white.rating', coerce: 'number' },
    secondRating: { from: 'black.rating', coerce: 'number' },
  },
  dedupeBy: 'url',
};

export function normalizeGames(rows: readonly ChessGameRow[], options?: NormalizeOptions): Event[] {
  return normalizeEvents(rows, chessGameDescriptor, options);
}

export interface PlayerFilter {
  /** Tracked usernames, matched case-insensitively; every player when omitted */
  players?: readonly string[];
}

function playerRuns(games: readonly Event[], players: readonly string[] | undefined) {
  return detectRuns(expandPerspectives(games), {
    domain: GAME_OUTCOMES,
    entities: players,
    identifierCase: 'lower',
  });
}

function byPlayer(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export interface WinStreakRow {
  player: string;
  longestWinStreak: number;
}

/** Longest consecutive wins per player; players who never won are left out. */
export function winStreaks(games: readonly Event[], options: PlayerFilter = {}): WinStreakRow[] {
  const summaries = summarizeRuns(playerRuns(games, options.players), {
    categories: ['win'],
    threshold: 1,
  });
  return summaries
    .filter((row) => row.longest.win > 0)
    .map((row) => ({ player: row.entityId, longestWinStreak: row.longest.win }))
    .sort((a, b) => b.longestWinStreak - a.longestWinStreak || byPlayer(a.player, b.player));
}

export interface StreaksAndTiltsOptions extends PlayerFilter {
  /** Runs at least this long count as hot streaks or tilts (default 3) */
  threshold?: number;
}

export interface StreaksAndTiltsRow {
  player: string;
  longestWinStreak: number;
  longestLossStreak: number;
  hotStreaks: number;
  tiltStreaks: number;
}

/** Longest winning and losing streaks, and how many of each reached the threshold. */
export function streaksAndTilts(
  games: readonly Event[],
  options: StreaksAndTiltsOptions = {}
): StreaksAndTiltsRow[] {
  const summaries = summarizeRuns(playerRuns(games, options.players), {
    categories: ['win', 'loss'],
    threshold: options.threshold ?? 3,
  });
  return summaries
    .filter((row) => row.longest.win > 0)
    .map((row) => ({
      player: row.entityId,
      longestWinStreak: row.longest.win,
      longestLossStreak: row.longest.loss,
      hotStreaks: row.atLeastThreshold.win,
      tiltStreaks: row.atLeastThreshold.loss,
    }))
    .sort((a, b) => b.longestWinStreak - a.longestWinStreak || byPlayer(a.player, b.player));
}

export interface HeadToHeadOptions extends PlayerFilter {
  minGames?: number;
}

export interface HeadToHeadRow {
  player1: string;
  player2: string;
  p1Wins: number;
  p2Wins: number;
  draws: number;
  totalGames: number;
  /** Share of decided games won by player1, `null` when every game was drawn */
  p1WinPct: number | null;
}

function headToHeadRows(
  games: readonly Event[],
  options: HeadToHeadOptions,
  mode: 'either' | 'both',
  minGames: number
): HeadToHeadRow[] {
  return aggregateMatchups(games, {
    minGames: options.minGames ?? minGames,
    entities: options.players,
    allowListMode: mode,
  }).map((aggregate) => ({
    player1: aggregate.key.first,
    player2: aggregate.key.second,
    p1Wins: aggregate.firstWins,
    p2Wins: aggregate.secondWins,
    draws: aggregate.draws,
    totalGames: aggregate.total,
    p1WinPct: aggregate.firstWinPct,
  }));
}

/** Pairwise records where at least one side is tracked (default: 3 games minimum). */
export function headToHead(games: readonly Event[], options: HeadToHeadOptions = {}): HeadToHeadRow[] {
  return headToHeadRows(games, options, 'either', 3);
}

/** Pairwise records between tracked players only (default: 5 games minimum). */
export function eliteHeadToHead(
  games: readonly Event[],
  options: HeadToHeadOptions = {}
): HeadToHeadRow[] {
  return headToHeadRows(games, options, 'both', 5);
}

export interface RivalryOptions extends PlayerFilter {
  minGames?: number;
  dominanceFactor?: number;
}

export interface RivalryRow {
  rivalry: string;
  player1: string;
  player2: string;
  timeClass: string | null;
  totalBattles: number;
  p1Wins: number;
  p2Wins: number;
  winDifferential: number;
  /** Share of all battles won by player1, three decimals */
  p1WinRate: number | null;
  status: string;
  firstBattle: OccurredAt;
  lastBattle: OccurredAt;
}

/** Decided games per pair and time class, with a dominance verdict (default: 50 battles minimum). */
export function rivalries(games: readonly Event[], options: RivalryOptions = {}): RivalryRow[] {
  const aggregates = aggregateMatchups(games, {
    minGames: options.minGames ?? 50,
    entities: options.players,
    groupBy: 'timeClass',
    decisiveOnly: true,
  });
  return aggregates.map((aggregate) => ({
    rivalry: `${aggregate.key.first} vs ${aggregate.key.second}`,
    player1: aggregate.key.first,
    player2: aggregate.key.second,
    timeClass: aggregate.group ?? null,
    totalBattles: aggregate.total,
    p1Wins: aggregate.firstWins,
    p2Wins: aggregate.secondWins,
    winDifferential: aggregate.winDifferential,
    p1WinRate: roundedRatio(aggregate.firstWins, aggregate.total, 3),
    status: classifyDominance(aggregate, options.dominanceFactor).label,
    firstBattle: aggregate.firstAt,
    lastBattle: aggregate.lastAt,
  }));
}

export interface UpsetReportOptions extends PlayerFilter {
  minRatingGap?: number;
  limit?: number;
}

export interface UpsetRow {
  winner: string;
  loser: string;
  winnerRating: number;
  loserRating: number;
  ratingGap: number;
  timeClass: string | null;
  endTime: OccurredAt;
  gameUrl: string | null;
}

function stringAttribute(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/** Lower-rated players beating higher-rated ones (default: more than 100 points, top 25). */
export function biggestUpsets(games: readonly Event[], options: UpsetReportOptions = {}): UpsetRow[] {
  return findUpsets(games, {
    minRatingGap: options.minRatingGap ?? 100,
    limit: options.limit ?? 25,
    entities: options.players,
    ratingAttributes: ['firstRating', 'secondRating'],
  }).map((upset) => ({
    winner: upset.winner,
    loser: upset.loser,
    winnerRating: upset.winnerRating,
    loserRating: upset.loserRating,
    ratingGap: upset.ratingGap,
    timeClass: stringAttribute(upset.attributes?.timeClass),
    endTime: upset.occurredAt,
    gameUrl: stringAttribute(upset.attributes?.url),
  }));
}
