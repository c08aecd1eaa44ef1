/**
 * Shared types for the season harvest pipeline
 */

/**
 * Where progress and warnings go. `console` satisfies it.
 */
export interface Logger {
	log(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	error(...args: unknown[]): void;
}

/** Directory under the output root that a record is filed under */
export type RecordCategory = 'games' | 'players';

export interface DaySummary {
	day: number;
	/** Games fetched (and written) for the day */
	games: number;
	/** Player statsheets written for the day */
	players: number;
	/** Team statsheet batches the player fetches were split into */
	batches: number;
}

export interface SeasonSummary {
	/** 0-based season index sent to the service */
	season: number;
	days: DaySummary[];
	games: number;
	players: number;
	/** HTTP requests issued over the whole run */
	requests: number;
}
