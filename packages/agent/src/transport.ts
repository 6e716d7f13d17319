/**
 * Heartbeat Transport
 *
 * Sends one encoded heartbeat to the local agent and returns the raw reply.
 * Uses native fetch with an AbortController timeout.
 */

import { ErrorCodes, HeartbeatIntervals, TransportError, toError } from "@hostbeat/common";

export interface TransportReply {
	status: number;
	body: string;
}

export interface HeartbeatTransport {
	/**
	 * Send one heartbeat body. Resolves with any HTTP status; rejects with
	 * {@link TransportError} only when no reply was received.
	 */
	send(body: string): Promise<TransportReply>;
	close(): Promise<void>;
}

export interface FetchTransportOptions {
	/** Agent host and port, without scheme */
	endpoint: string;
	/** Session host id the heartbeats are reported for */
	serverId: string;
	/** Per-request timeout in milliseconds (default: 5000) */
	timeoutMs?: number;
}

const HEARTBEAT_HEADERS = {
	Accept: "application/json",
	"Content-Type": "application/json; charset=utf-8",
} as const;

export function buildHeartbeatUrl(endpoint: string, serverId: string): string {
	return `http://${endpoint}/v1/sessionHosts/${encodeURIComponent(serverId)}`;
}

export class FetchHeartbeatTransport implements HeartbeatTransport {
	readonly url: string;
	private readonly timeoutMs: number;
	private readonly inFlight = new Set<AbortController>();
	private closed = false;

	constructor(options: FetchTransportOptions) {
		this.url = buildHeartbeatUrl(options.endpoint, options.serverId);
		this.timeoutMs = options.timeoutMs ?? HeartbeatIntervals.REQUEST_TIMEOUT_MS;
	}

	async send(body: string): Promise<TransportReply> {
		if (this.closed) {
			throw new TransportError("Heartbeat transport is closed");
		}

		const controller = new AbortController();
		let timedOut = false;
		const timeoutId = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, this.timeoutMs);
		this.inFlight.add(controller);

		try {
			const response = await fetch(this.url, {
				method: "PATCH",
				headers: HEARTBEAT_HEADERS,
				body,
				signal: controller.signal,
			});

			return { status: response.status, body: await response.text() };
		} catch (error) {
			if (timedOut) {
				throw new TransportError(
					`Heartbeat request timed out after ${this.timeoutMs}ms`,
					ErrorCodes.TRANSPORT_TIMEOUT,
					toError(error),
				);
			}
			const cause = toError(error);
			throw new TransportError(
				`Heartbeat request failed: ${cause.message}`,
				ErrorCodes.TRANSPORT_REQUEST_FAILED,
				cause,
			);
		} finally {
			clearTimeout(timeoutId);
			this.inFlight.delete(controller);
		}
	}

	/**
	 * Refuse further sends and abort any request still in flight.
	 */
	async close(): Promise<void> {
		this.closed = true;
		for (const controller of this.inFlight) {
			controller.abort();
		}
		this.inFlight.clear();
	}
}
