/**
 * Tests for configuration overrides
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('resolveConfig', () => {
	it('should return the defaults without overrides', () => {
		expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
		expect(DEFAULT_CONFIG.daysPerSeason).toBe(99);
		expect(DEFAULT_CONFIG.teamBatchSize).toBe(5);
		expect(DEFAULT_CONFIG.outDir).toBe('out');
	});

	it('should apply overrides and trim a trailing slash from the base URL', () => {
		const config = resolveConfig({ baseUrl: 'http://localhost:8080/database/', teamBatchSize: 3 });

		expect(config.baseUrl).toBe('http://localhost:8080/database');
		expect(config.teamBatchSize).toBe(3);
		expect(config.maxConcurrentRequests).toBe(DEFAULT_CONFIG.maxConcurrentRequests);
	});

	it('should reject a non-positive batch size', () => {
		expect(() => resolveConfig({ teamBatchSize: 0 })).toThrow(ConfigError);
	});

	it('should reject a base URL that is not a URL', () => {
		expect(() => resolveConfig({ baseUrl: 'not a url' })).toThrow(/^Invalid configuration: baseUrl: /);
	});
});
