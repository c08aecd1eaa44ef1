/**
 * Harvest configuration. The CLI always runs with the defaults; tests and
 * programmatic callers pass overrides.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

const positiveInt = z.number().int().positive();

export const HarvestConfigSchema = z.object({
	/** Base URL of the statsheet service, without a trailing slash */
	baseUrl: z
		.string()
		.url()
		.transform((url) => url.replace(/\/+$/, '')),
	/** Output root, relative to the working directory */
	outDir: z.string().min(1),
	daysPerSeason: positiveInt,
	/** Team statsheets per player-statsheet request */
	teamBatchSize: positiveInt,
	maxConcurrentRequests: positiveInt,
	maxConcurrentWrites: positiveInt,
	requestTimeoutMs: positiveInt,
});

export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;

export const DEFAULT_CONFIG: HarvestConfig = {
	baseUrl: 'https://www.blaseball.com/database',
	outDir: 'out',
	daysPerSeason: 99,
	teamBatchSize: 5,
	maxConcurrentRequests: 16,
	maxConcurrentWrites: 32,
	requestTimeoutMs: 30_000,
};

export function resolveConfig(overrides: Partial<HarvestConfig> = {}): HarvestConfig {
	const result = HarvestConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...overrides });
	if (!result.success) {
		const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
		throw new ConfigError(`Invalid configuration: ${details}`);
	}
	return result.data;
}
