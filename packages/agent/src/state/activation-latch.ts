/**
 * One-shot gate released when the server leaves the waiting phase.
 *
 * Once released it stays released: later waiters resolve immediately.
 */
export class ActivationLatch {
	private released = false;
	private waiters: Array<() => void> = [];

	release(): void {
		if (this.released) return;
		this.released = true;
		for (const resolve of this.waiters.splice(0)) {
			resolve();
		}
	}

	isReleased(): boolean {
		return this.released;
	}

	/**
	 * Resolve once {@link ActivationLatch.release} has been called. No timeout.
	 */
	wait(): Promise<void> {
		if (this.released) {
			return Promise.resolve();
		}
		return new Promise<void>((resolve) => {
			this.waiters.push(resolve);
		});
	}
}
