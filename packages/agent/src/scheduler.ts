/**
 * Heartbeat Scheduler
 *
 * Owns the single background loop that exchanges heartbeats with the agent.
 * Each iteration waits for the interval or an early-wake signal, then sends the
 * current state, decodes the reply and hands it to the dispatcher. Failures are
 * logged and the loop carries on.
 */

import { DecodeError, HeartbeatIntervals, TransportError, toError } from "@hostbeat/common";
import type { Logger } from "@hostbeat/logger";
import { decodeHeartbeatResponse, encodeHeartbeatRequest } from "./codec";
import type { OperationDispatcher } from "./dispatcher";
import type { SharedHeartbeatState } from "./state";
import type { HeartbeatTransport } from "./transport";

export interface HeartbeatSchedulerOptions {
	state: SharedHeartbeatState;
	dispatcher: OperationDispatcher;
	transport: HeartbeatTransport;
	logger: Logger;
	/** Milliseconds between heartbeats (default: 1000) */
	intervalMs?: number;
}

export class HeartbeatScheduler {
	private readonly state: SharedHeartbeatState;
	private readonly dispatcher: OperationDispatcher;
	private readonly transport: HeartbeatTransport;
	private readonly logger: Logger;
	private readonly intervalMs: number;

	private running = false;
	private stopped = false;
	private loop: Promise<void> | null = null;
	private stopping: Promise<void> | null = null;

	constructor(options: HeartbeatSchedulerOptions) {
		this.state = options.state;
		this.dispatcher = options.dispatcher;
		this.transport = options.transport;
		this.logger = options.logger.child({ component: "scheduler" });
		this.intervalMs = options.intervalMs ?? HeartbeatIntervals.HEARTBEAT_MS;
	}

	/**
	 * Start the loop. Calling again while it runs is a no-op.
	 *
	 * @returns false once the scheduler has been stopped
	 */
	start(): boolean {
		if (this.stopped) {
			this.logger.warn("Cannot restart a stopped heartbeat scheduler");
			return false;
		}
		if (this.loop) {
			return true;
		}

		this.running = true;
		this.loop = this.run().catch((error: unknown) => {
			this.logger.error({ err: toError(error) }, "Heartbeat loop crashed");
		});
		return true;
	}

	isRunning(): boolean {
		return this.running;
	}

	/**
	 * End the loop after the current iteration without closing the transport.
	 */
	halt(): void {
		if (!this.running) return;
		this.running = false;
		this.state.signal.signal();
	}

	/**
	 * Halt the loop, wait for it to exit, then close the transport. Idempotent.
	 */
	stop(): Promise<void> {
		if (!this.stopping) {
			this.stopping = this.shutdown();
		}
		return this.stopping;
	}

	/**
	 * Perform one heartbeat exchange. Never throws.
	 */
	async heartbeat(): Promise<void> {
		this.refreshHealth();
		const body = encodeHeartbeatRequest(this.state.snapshotRequest());

		try {
			const reply = await this.transport.send(body);
			if (reply.status >= 300) {
				throw TransportError.badStatus(reply.status, reply.body);
			}
			this.dispatcher.dispatch(decodeHeartbeatResponse(reply.body));
		} catch (error) {
			if (error instanceof TransportError) {
				this.logger.warn({ err: error, status: error.status }, "Heartbeat exchange failed");
			} else if (error instanceof DecodeError) {
				this.logger.error({ err: error }, "Failed to decode heartbeat response");
			} else {
				this.logger.error({ err: toError(error) }, "Unexpected heartbeat failure");
			}
		}
	}

	private async run(): Promise<void> {
		this.logger.info({ intervalMs: this.intervalMs }, "Heartbeat loop started");

		while (this.running) {
			const signaled = await this.state.signal.wait(this.intervalMs);
			if (!this.running) break;
			if (signaled) {
				this.logger.debug("State transition signaled an early heartbeat.");
			}
			await this.heartbeat();
		}

		this.logger.info("Heartbeat loop stopped");
	}

	private refreshHealth(): void {
		const callback = this.state.getHealthCallback();
		if (!callback) return;

		try {
			this.state.setHealthy(callback());
		} catch (error) {
			this.logger.error({ err: toError(error) }, "Health callback failed");
		}
	}

	private async shutdown(): Promise<void> {
		this.stopped = true;
		this.halt();

		if (this.loop) {
			await this.loop;
		}

		try {
			await this.transport.close();
		} catch (error) {
			this.logger.warn({ err: toError(error) }, "Failed to close heartbeat transport");
		}
	}
}
