/**
 * Wake-up signal for the heartbeat loop.
 *
 * The loop waits for either the heartbeat interval to elapse or a local state
 * change to ask for an early heartbeat. A signal raised while nobody waits stays
 * pending until the next wait, and raising it again while pending has no effect,
 * so no wake-up is lost and none is counted twice.
 *
 * Single waiter: only the scheduler loop calls {@link HeartbeatSignal.wait}.
 */
export class HeartbeatSignal {
	private pending = false;
	private wake: (() => void) | null = null;

	/**
	 * Request an early heartbeat.
	 */
	signal(): void {
		if (this.wake) {
			const wake = this.wake;
			this.wake = null;
			wake();
			return;
		}
		this.pending = true;
	}

	isPending(): boolean {
		return this.pending;
	}

	/**
	 * Wait up to `timeoutMs` for a signal.
	 *
	 * @returns true when woken by a signal, false on timeout
	 */
	wait(timeoutMs: number): Promise<boolean> {
		if (this.pending) {
			this.pending = false;
			return Promise.resolve(true);
		}

		return new Promise<boolean>((resolve) => {
			const timer = setTimeout(() => {
				this.wake = null;
				resolve(false);
			}, timeoutMs);

			this.wake = () => {
				clearTimeout(timer);
				resolve(true);
			};
		});
	}
}
