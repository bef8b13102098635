/**
 * Refresh attempts left for one invocation. A single instance is shared by
 * the lookup and the refresh coordinator, so the ceiling spans every term.
 */
export class RetryBudget {
	private used = 0;

	constructor(readonly max: number) {}

	get attempts(): number {
		return this.used;
	}

	get remaining(): number {
		return Math.max(0, this.max - this.used);
	}

	get exhausted(): boolean {
		return this.used >= this.max;
	}

	/**
	 * Take one attempt. Returns false, and takes nothing, when none are left.
	 */
	consume(): boolean {
		if (this.exhausted) return false;
		this.used += 1;
		return true;
	}
}
