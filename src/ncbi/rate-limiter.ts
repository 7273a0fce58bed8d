/**
 * Lane-based rate limiter for NCBI E-utilities
 *
 * Each lane (one per concurrent job) keeps its own next-allowed time, and
 * callers are assigned lanes round-robin. With N lanes and a per-lane delay
 * D, any two requests are also spaced at least D/N apart, so the client
 * never exceeds N/D requests per second, even when idle lanes free up
 * together.
 *
 * NCBI limits: 3 requests/s without an API key, 10 with one.
 */

export interface RateLimiterClock {
	now(): number
	sleep(ms: number): Promise<void>
}

const systemClock: RateLimiterClock = {
	now: () => Date.now(),
	sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
}

export class LaneRateLimiter {
	private laneNextAt: number[]
	private nextAt = 0
	private rr = 0

	/**
	 * @param lanes Number of concurrent lanes
	 * @param minDelayMs Minimum delay between two requests on one lane
	 */
	constructor(
		private readonly lanes: number,
		private readonly minDelayMs: number,
		private readonly clock: RateLimiterClock = systemClock,
	) {
		if (lanes < 1) throw new RangeError("lanes must be at least 1")
		this.laneNextAt = Array.from({ length: lanes }, () => 0)
	}

	get delayMs(): number {
		return this.minDelayMs
	}

	/** Wait for the next slot on the next lane */
	async wait(): Promise<void> {
		const lane = this.rr++ % this.lanes
		const laneNextAt = this.laneNextAt[lane] ?? 0
		// Reserve before sleeping so concurrent callers queue behind us
		const start = Math.max(this.clock.now(), laneNextAt, this.nextAt)
		this.laneNextAt[lane] = start + this.minDelayMs
		this.nextAt = start + this.minDelayMs / this.lanes

		const waitMs = start - this.clock.now()
		if (waitMs > 0) {
			await this.clock.sleep(waitMs)
		}
	}

	/**
	 * Hold every lane for at least `ms` (server asked us to back off,
	 * e.g. 429 with Retry-After).
	 */
	pause(ms: number): void {
		const until = this.clock.now() + ms
		this.laneNextAt = this.laneNextAt.map(at => Math.max(at, until))
		this.nextAt = Math.max(this.nextAt, until)
	}

	reset(): void {
		this.laneNextAt = Array.from({ length: this.lanes }, () => 0)
		this.nextAt = 0
		this.rr = 0
	}
}
