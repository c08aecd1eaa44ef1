/**
 * Shared HTTP client for the statsheet service.
 *
 * One instance serves every day pipeline of a run. Connection pooling is left
 * to the global fetch; this class bounds how many requests are in flight and
 * turns failures into TransportError / DecodeError.
 */

import { createLimiter, type Limiter } from './concurrency.js';
import { CancelledError, DecodeError, HarvestError, TransportError, describeError } from './errors.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number>;

export interface HttpClientOptions {
	/** Used as given; `resolveConfig` trims the trailing slash */
	baseUrl: string;
	maxConcurrentRequests: number;
	requestTimeoutMs: number;
	/** Defaults to the global fetch */
	fetch?: FetchLike;
}

export interface JsonResponse {
	url: string;
	body: unknown;
}

export class HttpClient {
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly fetchImpl: FetchLike;
	private readonly limiter: Limiter;
	private requests = 0;

	constructor(options: HttpClientOptions) {
		this.baseUrl = options.baseUrl;
		this.timeoutMs = options.requestTimeoutMs;
		this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
		this.limiter = createLimiter(options.maxConcurrentRequests);
	}

	/** Requests sent so far, including failed ones */
	get requestCount(): number {
		return this.requests;
	}

	buildUrl(endpoint: string, query: QueryParams): string {
		const url = new URL(`${this.baseUrl}/${endpoint}`);
		for (const [key, value] of Object.entries(query)) {
			url.searchParams.set(key, String(value));
		}
		return url.toString();
	}

	/**
	 * GET `endpoint` and parse the body as JSON.
	 *
	 * Rejects with CancelledError if `signal` aborts before or during the
	 * request.
	 */
	async getJson(endpoint: string, query: QueryParams, signal?: AbortSignal): Promise<JsonResponse> {
		const url = this.buildUrl(endpoint, query);
		const text = await this.limiter.run(() => this.send(url, signal), signal);

		let body: unknown;
		try {
			body = JSON.parse(text);
		} catch (error) {
			throw new DecodeError(url, 'Response body is not valid JSON', { cause: error });
		}
		return { url, body };
	}

	private async send(url: string, signal?: AbortSignal): Promise<string> {
		if (signal?.aborted) {
			throw new CancelledError();
		}

		const controller = new AbortController();
		const onAbort = (): void => controller.abort();
		signal?.addEventListener('abort', onAbort, { once: true });
		const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

		this.requests++;
		try {
			const response = await this.fetchImpl(url, {
				method: 'GET',
				headers: { Accept: 'application/json' },
				signal: controller.signal,
			});
			if (!response.ok) {
				throw new TransportError(url, response.status, `HTTP ${response.status} ${response.statusText}`.trim());
			}
			return await response.text();
		} catch (error) {
			if (signal?.aborted) {
				throw new CancelledError();
			}
			if (error instanceof HarvestError) {
				throw error;
			}
			if (controller.signal.aborted) {
				throw new TransportError(url, null, `Request timed out after ${this.timeoutMs}ms`, { cause: error });
			}
			throw new TransportError(url, null, `Request failed: ${describeError(error)}`, { cause: error });
		} finally {
			clearTimeout(timeout);
			signal?.removeEventListener('abort', onAbort);
		}
	}
}
