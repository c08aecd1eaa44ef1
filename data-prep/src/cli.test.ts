/**
 * Tests for the CLI entry point
 */

import { describe, it, expect } from 'vitest';
import { main, USAGE } from './cli.js';
import { buildSeason, createFakeService, silentLogger } from '../test/helpers/fake-service.js';

describe('main', () => {
	it('should exit 1 with usage for a missing season, without any request', async () => {
		const service = createFakeService(buildSeason({}));
		const logger = silentLogger();

		const code = await main([], { fetch: service.fetch, logger });

		expect(code).toBe(1);
		expect(logger.error.mock.calls).toEqual([['error: ArgumentError: Missing season!'], [USAGE]]);
		expect(service.fetch).not.toHaveBeenCalled();
	});

	it('should exit 1 for an unparsable season', async () => {
		const service = createFakeService(buildSeason({}));
		const logger = silentLogger();

		const code = await main(['eleven'], { fetch: service.fetch, logger });

		expect(code).toBe(1);
		expect(logger.error).toHaveBeenCalledWith('error: ArgumentError: Season must be a positive integer, got "eleven"');
	});

	it('should exit 0 and print a summary for a season with no games', async () => {
		const service = createFakeService(buildSeason({}));
		const logger = silentLogger();

		const code = await main(['2'], { fetch: service.fetch, logger });

		expect(code).toBe(0);
		expect(logger.log).toHaveBeenLastCalledWith(
			'✅ Season 2: 0 games and 0 player statsheets over 99 days (99 requests)'
		);
		expect(service.requests.every((request) => request.season === 1)).toBe(true);
	});

	it('should exit 1 and describe a transport failure', async () => {
		const service = createFakeService(buildSeason({}), { failWith: () => 503 });
		const logger = silentLogger();

		const code = await main(['1'], { fetch: service.fetch, logger });

		expect(code).toBe(1);
		expect(logger.error).toHaveBeenCalledWith(expect.stringMatching(/^error: TransportError: HTTP 503 Upstream Failure \(/));
	});
});
