// Logging
export { silentLogger } from './logger.js';
export type { RunOptions } from './logger.js';

// Match engine + summaries
export type { MatchResult, MatchSummary, SideSummary } from './match/types.js';
export { runMatch } from './match/runner.js';
export { summarizeMatch, describeMatchResult } from './match/summary.js';

// Tournament engine + ranking + report
export type { Entrant, Pairing, RankingEntry, TournamentResult } from './tournament/types.js';
export { runTournament } from './tournament/runner.js';
export { assignIds, rankScores } from './tournament/ranking.js';
export { formatTournamentReport, formatTimestamp } from './tournament/report.js';
export type { ReportOptions } from './tournament/report.js';
