import { getLogger } from './logger.js';

/**
 * Fixed-interval rate limiter.
 * Keeps a single "time of last call" and sleeps until `1000 / requestsPerSecond`
 * ms have passed since it. Concurrent callers are queued behind each other.
 */
export class IntervalLimiter {
    private lastCall = 0;
    private queue: Promise<void> = Promise.resolve();
    readonly intervalMs: number;

    constructor(requestsPerSecond: number) {
        if (!(requestsPerSecond > 0)) {
            throw new RangeError(`requestsPerSecond must be positive, got ${requestsPerSecond}`);
        }
        this.intervalMs = Math.ceil(1000 / requestsPerSecond);
    }

    acquire(): Promise<void> {
        const turn = this.queue.then(() => this.waitForSlot());
        this.queue = turn;
        return turn;
    }

    private async waitForSlot(): Promise<void> {
        const waitMs = this.lastCall + this.intervalMs - Date.now();
        if (waitMs > 0) {
            await sleep(waitMs);
        }
        this.lastCall = Date.now();
    }
}

/**
 * Per-source rate limits in requests per second.
 */
const RATE_LIMITS: Record<string, number> = {
    pubmed: 3,      // NCBI E-utilities without an API key
    default: 5,
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source rate limiting
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * HTTP error. `status` is 0 for network failures and timeouts.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;

    /** Overrides for the per-source requests-per-second table */
    rateLimits?: Record<string, number>;
}

/**
 * Centralized HTTP client with per-source rate limiting.
 * A failed request is reported once; there is no retry.
 */
export class HttpClient {
    private limiters = new Map<string, IntervalLimiter>();
    private requestCounts = new Map<string, number>();
    private readonly rateLimits: Record<string, number>;
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.rateLimits = { ...RATE_LIMITS, ...options?.rateLimits };
        const version = options?.version ?? '1.0.0';
        const email = options?.email ?? 'user@example.com';
        this.userAgent = `industry-papers/${version} (mailto:${email})`;
    }

    /**
     * GET `url` after waiting for the source's rate limit.
     */
    async get<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const {
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        await this.getLimiter(source).acquire();

        // Track request count
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        getLogger().debug({ url, source }, 'HTTP request');

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers: requestHeaders,
                signal: controller.signal,
            });

            // Parse response
            const contentType = response.headers.get('content-type') ?? '';
            let data: T;
            if (contentType.includes('application/json')) {
                data = (await response.json()) as T;
            } else {
                data = (await response.text()) as T;
            }

            // Build headers map
            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (!response.ok) {
                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    data
                );
            }

            return { status: response.status, headers: responseHeaders, data, ok: true };
        } catch (error) {
            if (error instanceof HttpError) throw error;

            if (error instanceof Error && error.name === 'AbortError') {
                throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0);
            }

            throw new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0
            );
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    private getLimiter(source: string): IntervalLimiter {
        let limiter = this.limiters.get(source);
        if (!limiter) {
            const perSecond = this.rateLimits[source] ?? this.rateLimits['default'] ?? RATE_LIMITS['default'] ?? 1;
            limiter = new IntervalLimiter(perSecond);
            this.limiters.set(source, limiter);
        }
        return limiter;
    }
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
