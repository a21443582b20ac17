// Chess
export {
  chessGameDescriptor,
  normalizeGames,
  winStreaks,
  streaksAndTilts,
  headToHead,
  eliteHeadToHead,
  rivalries,
  biggestUpsets,
  GAME_OUTCOMES,
} from './chess';
export type {
  ChessGameRow,
  ChessSide,
  PlayerFilter,
  WinStreakRow,
  StreaksAndTiltsOptions,
  StreaksAndTiltsRow,
  HeadToHeadOptions,
  HeadToHeadRow,
  RivalryOptions,
  RivalryRow,
  UpsetReportOptions,
  UpsetRow,
} from './chess';

// Weather
export { classifyWeatherDay, weatherDaily, gloomyStreaks } from './weather';
export type { WeatherRow, WeatherDay, GloomyStreakOptions, GloomyStreakRow } from './weather';

// Stack Overflow
export { combineMonthlySources, monthlyTrends, tagTrends } from './stackoverflow';
export type {
  MonthlyQuestionsRow,
  MonthlyTagRow,
  TrendOptions,
  MonthlyTrendOptions,
  MonthlyTrendRow,
  TagTrendRow,
} from './stackoverflow';

// Label tables
export { ERA_TABLE, SEASON_TABLE, WEATHER_CATEGORY_TABLE, describeWeatherCode } from './labels';
