import { EventSystem, type EventMapFromTuple } from "../core/events/event-system";
import { generateId } from "../core/generate-id/generate-id";
import {
	createFeedback,
	type DeepPartial,
	type InteractiveMarker,
	type InteractiveMarkerFeedback,
	type InteractiveMarkerUpdate,
} from "../markers/types";
import { decodePacket, encodePacket } from "../protocol/packets";
import { GetMarkersResponseSchema, UpdateSchema, type GetMarkersResponse } from "../protocol/schemas";
import { MessageType, type NetworkConfig, type TransportAdapter } from "./types";

/**
 * Configuration for MarkerClientNetwork
 */
export interface MarkerClientNetworkConfig {
	/** Transport adapter for server connection */
	transport: TransportAdapter;

	/** Sent as `clientId` in every feedback (default: a generated id) */
	clientId?: string;

	/** Network configuration */
	config?: NetworkConfig;
}

/**
 * Events emitted by the observer mirror
 */
export type MarkerClientEvents = [
	/** A marker was created, replaced or moved */
	["markerUpdated", InteractiveMarker],
	/** A marker was removed */
	["markerErased", string],
	/** The mirror caught up with a snapshot; carries its sequence number */
	["synchronized", number],
];

/**
 * Feedback fields supplied by the caller; the rest default to their nil values
 */
export type FeedbackInput = DeepPartial<InteractiveMarkerFeedback> & { markerName: string };

type SyncState = "initializing" | "running";

/**
 * Observer side of the marker protocol.
 *
 * Keeps a mirror of the server's committed markers: it asks for the markers
 * on construction, buffers updates until the answer arrives, then applies
 * updates strictly in sequence order. Older updates are ignored; a gap in the
 * sequence triggers a new request and buffering until it is answered.
 *
 * @example
 * ```ts
 * const client = new MarkerClientNetwork({
 *   transport: await WsClientTransport.connect("ws://localhost:8080"),
 * });
 *
 * client.on("markerUpdated", (marker) => render(marker));
 * client.on("markerErased", (name) => remove(name));
 *
 * client.sendFeedback({
 *   markerName: "simple_6dof",
 *   eventType: FeedbackType.POSE_UPDATE,
 *   pose: draggedPose,
 * });
 * ```
 */
export class MarkerClientNetwork {
	readonly clientId: string;
	private transport: TransportAdapter;
	private config: Required<NetworkConfig>;
	private events = new EventSystem<MarkerClientEvents>({
		events: ["markerUpdated", "markerErased", "synchronized"],
	});

	/** Mirror of the committed markers */
	private markers = new Map<string, InteractiveMarker>();

	/** Sequence number of the last applied update or snapshot */
	private lastSequenceNumber = 0;

	private state: SyncState = "initializing";

	/** Request id of the outstanding marker request */
	private pendingRequestId: string | undefined;

	/** Updates received while initializing, applied once the markers arrive */
	private bufferedUpdates: InteractiveMarkerUpdate[] = [];

	/** Connection lifecycle handlers */
	private disconnectHandlers: Array<() => void> = [];
	private errorHandlers: Array<(error: Error) => void> = [];

	/** Connection state */
	private connected = false;

	/** Rate limiting state */
	private messageCount = 0;
	private messageCountWindow = Date.now();

	/** Heartbeat timer */
	private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

	/** Last time we received a message from server */
	private lastMessageReceivedAt = Date.now();

	constructor(config: MarkerClientNetworkConfig) {
		this.transport = config.transport;
		this.clientId = config.clientId ?? generateId({ prefix: "observer_" });
		this.config = {
			maxMessageSize: config.config?.maxMessageSize ?? 65536,
			debug: config.config?.debug ?? false,
			maxMessagesPerSecond: config.config?.maxMessagesPerSecond ?? 60,
			maxSendQueueSize: config.config?.maxSendQueueSize ?? 100,
			heartbeatInterval: config.config?.heartbeatInterval ?? 30000,
			heartbeatTimeout: config.config?.heartbeatTimeout ?? 60000,
		};

		this.setupTransportHandlers();
		this.setupHeartbeat();
		this.requestMarkers();
	}

	/**
	 * Send feedback for a marker. `clientId` is always this client's id.
	 * @returns false if not connected or rate limited
	 */
	sendFeedback(feedback: FeedbackInput): boolean {
		if (!this.connected) {
			this.log("Cannot send feedback: not connected");
			return false;
		}

		if (!this.checkRateLimit()) {
			this.log("Rate limit exceeded, dropping feedback");
			return false;
		}

		const message = createFeedback({ ...feedback, clientId: this.clientId });
		this.sendMessage(encodePacket(MessageType.FEEDBACK, message));

		this.log(`Sent feedback (event: ${message.eventType}, marker: '${message.markerName}')`);
		return true;
	}

	/**
	 * Drop the mirror's ordering state and ask the server for its markers again
	 */
	resync(): void {
		this.requestMarkers();
	}

	/**
	 * Register a callback for mirror events
	 * @returns Unsubscribe function
	 */
	on<EventName extends keyof EventMapFromTuple<MarkerClientEvents> & string>(
		name: EventName,
		callback: (data: EventMapFromTuple<MarkerClientEvents>[EventName]) => void
	): () => void {
		return this.events.on(name, callback);
	}

	/**
	 * Copy of a mirrored marker
	 */
	getMarker(name: string): InteractiveMarker | undefined {
		const marker = this.markers.get(name);
		return marker ? structuredClone(marker) : undefined;
	}

	/**
	 * Copies of all mirrored markers
	 */
	getMarkers(): InteractiveMarker[] {
		return Array.from(this.markers.values(), (marker) => structuredClone(marker));
	}

	/**
	 * Sequence number the mirror corresponds to
	 */
	getSequenceNumber(): number {
		return this.lastSequenceNumber;
	}

	/**
	 * True once markers have arrived and no gap is being recovered
	 */
	isSynchronized(): boolean {
		return this.state === "running";
	}

	/**
	 * Register a handler for disconnection events
	 */
	onDisconnect(handler: () => void): () => void {
		this.disconnectHandlers.push(handler);
		return () => {
			const index = this.disconnectHandlers.indexOf(handler);
			if (index > -1) this.disconnectHandlers.splice(index, 1);
		};
	}

	/**
	 * Register a handler for transport errors
	 */
	onError(handler: (error: Error) => void): () => void {
		this.errorHandlers.push(handler);
		return () => {
			const index = this.errorHandlers.indexOf(handler);
			if (index > -1) this.errorHandlers.splice(index, 1);
		};
	}

	/**
	 * Check if connected to server
	 */
	isConnected(): boolean {
		return this.connected;
	}

	/**
	 * Disconnect from server
	 */
	disconnect(): void | Promise<void> {
		this.log("Disconnecting...");

		this.stopHeartbeat();

		return this.transport.close();
	}

	/**
	 * Setup transport event handlers
	 */
	private setupTransportHandlers(): void {
		this.transport.onMessage((data) => {
			this.handleMessage(data);
		});

		this.transport.onClose(() => {
			this.handleDisconnection();
		});

		if (this.transport.onError) {
			this.transport.onError((error) => {
				this.handleError(error);
			});
		}

		// Transports hand over an open connection
		this.connected = true;
		this.lastMessageReceivedAt = Date.now();
	}

	/**
	 * Setup heartbeat mechanism
	 */
	private setupHeartbeat(): void {
		if (this.config.heartbeatInterval === 0) {
			return; // Heartbeats disabled
		}

		this.heartbeatTimer = setInterval(() => {
			this.checkHeartbeat();
		}, this.config.heartbeatInterval);
	}

	private stopHeartbeat(): void {
		if (this.heartbeatTimer) {
			clearInterval(this.heartbeatTimer);
			this.heartbeatTimer = null;
		}
	}

	/**
	 * Check server heartbeat timeout and send heartbeat
	 */
	private checkHeartbeat(): void {
		const timeSinceLastMessage = Date.now() - this.lastMessageReceivedAt;

		if (timeSinceLastMessage > this.config.heartbeatTimeout) {
			this.log(`Server timed out (no message for ${timeSinceLastMessage}ms)`);
			this.closeTransport();
			return;
		}

		this.sendMessage(encodePacket(MessageType.HEARTBEAT));
	}

	/**
	 * Enter the initializing state and ask for the committed markers
	 */
	private requestMarkers(): void {
		this.state = "initializing";
		this.pendingRequestId = generateId({ prefix: "req_" });
		this.sendMessage(encodePacket(MessageType.GET_MARKERS, { requestId: this.pendingRequestId }));
		this.log(`Requested markers (request: ${this.pendingRequestId})`);
	}

	/**
	 * Handle incoming message from server
	 */
	private handleMessage(data: Uint8Array): void {
		this.lastMessageReceivedAt = Date.now();

		if (data.byteLength === 0) {
			this.log("Received empty message from server");
			return;
		}

		if (data.byteLength > this.config.maxMessageSize) {
			this.log(`Message exceeds max size: ${data.byteLength} > ${this.config.maxMessageSize}`);
			return;
		}

		let payload: unknown;
		try {
			payload = decodePacket(data).payload;
		} catch (error) {
			this.log(`Failed to decode message: ${error}`);
			return;
		}

		const messageType = data[0];

		switch (messageType) {
			case MessageType.UPDATE:
				this.handleUpdate(payload);
				break;
			case MessageType.MARKERS:
				this.handleMarkers(payload);
				break;
			case MessageType.HEARTBEAT:
				this.log("Received heartbeat from server");
				break;
			default:
				this.log(`Unknown message type: ${messageType}`);
		}
	}

	private handleUpdate(payload: unknown): void {
		const parsed = UpdateSchema.safeParse(payload);
		if (!parsed.success) {
			this.log(`Invalid update: ${parsed.error.message}`);
			return;
		}

		if (this.state === "initializing") {
			this.bufferUpdate(parsed.data);
			this.log(`Buffered update ${parsed.data.seqNum} while initializing`);
			return;
		}

		this.applyInOrder(parsed.data);
	}

	/**
	 * Replace the mirror with the committed markers, then replay buffered updates
	 */
	private handleMarkers(payload: unknown): void {
		const parsed = GetMarkersResponseSchema.safeParse(payload);
		if (!parsed.success) {
			this.log(`Invalid markers response: ${parsed.error.message}`);
			return;
		}

		if (parsed.data.requestId !== this.pendingRequestId) {
			this.log(`Ignoring markers for stale request ${parsed.data.requestId}`);
			return;
		}

		this.applySnapshot(parsed.data);

		const buffered = this.bufferedUpdates.sort((a, b) => a.seqNum - b.seqNum);
		this.bufferedUpdates = [];
		for (const update of buffered) {
			if (this.state === "initializing") {
				// A gap while replaying re-requested the markers; keep the rest for the next snapshot
				this.bufferUpdate(update);
			} else {
				this.applyInOrder(update);
			}
		}

		if (this.state === "running") {
			this.events.emit("synchronized", this.lastSequenceNumber);
		}
	}

	private applySnapshot(snapshot: GetMarkersResponse): void {
		const names = new Set(snapshot.markers.map((marker) => marker.name));
		const erased = Array.from(this.markers.keys()).filter((name) => !names.has(name));

		this.markers = new Map(snapshot.markers.map((marker) => [marker.name, marker]));
		this.lastSequenceNumber = snapshot.sequenceNumber;
		this.pendingRequestId = undefined;
		this.state = "running";

		this.log(`Synchronized ${snapshot.markers.length} markers at sequence ${snapshot.sequenceNumber}`);

		for (const name of erased) {
			this.events.emit("markerErased", name);
		}
		for (const marker of snapshot.markers) {
			this.events.emit("markerUpdated", structuredClone(marker));
		}
	}

	/**
	 * Apply the next update in sequence; ignore old ones, resync on a gap
	 */
	private applyInOrder(update: InteractiveMarkerUpdate): void {
		if (update.seqNum <= this.lastSequenceNumber) {
			this.log(`Ignoring update ${update.seqNum}, already at ${this.lastSequenceNumber}`);
			return;
		}

		if (update.seqNum !== this.lastSequenceNumber + 1) {
			this.log(`Sequence gap: expected ${this.lastSequenceNumber + 1}, got ${update.seqNum}; requesting markers`);
			this.requestMarkers();
			this.bufferUpdate(update);
			return;
		}

		this.applyUpdate(update);
	}

	/**
	 * Hold an update until the markers arrive, dropping the oldest beyond maxSendQueueSize
	 */
	private bufferUpdate(update: InteractiveMarkerUpdate): void {
		if (this.bufferedUpdates.length >= this.config.maxSendQueueSize) {
			const dropped = this.bufferedUpdates.shift();
			this.log(`Update buffer full, dropping update ${dropped?.seqNum}`);
		}
		this.bufferedUpdates.push(update);
	}

	private applyUpdate(update: InteractiveMarkerUpdate): void {
		this.lastSequenceNumber = update.seqNum;

		for (const marker of update.markers) {
			this.markers.set(marker.name, marker);
			this.events.emit("markerUpdated", structuredClone(marker));
		}

		for (const { name, header, pose } of update.poses) {
			const marker = this.markers.get(name);
			if (!marker) {
				this.log(`Pose update for unknown marker '${name}', ignoring`);
				continue;
			}
			marker.header = header;
			marker.pose = pose;
			this.events.emit("markerUpdated", structuredClone(marker));
		}

		for (const name of update.erases) {
			if (this.markers.delete(name)) {
				this.events.emit("markerErased", name);
			}
		}

		this.log(`Applied update ${update.seqNum}`);
	}

	/**
	 * Hand a message to the transport, logging failures
	 */
	private sendMessage(message: Uint8Array): void {
		try {
			const result = this.transport.send(message);
			if (result instanceof Promise) {
				result.catch((error: unknown) => {
					this.log(`Failed to send message: ${error}`);
				});
			}
		} catch (error) {
			this.log(`Failed to send message: ${error}`);
		}
	}

	private closeTransport(): void {
		this.stopHeartbeat();
		try {
			const result = this.transport.close();
			if (result instanceof Promise) {
				result.catch((error: unknown) => {
					this.log(`Failed to close transport: ${error}`);
				});
			}
		} catch (error) {
			this.log(`Failed to close transport: ${error}`);
		}
	}

	/**
	 * Handle disconnection from server
	 */
	private handleDisconnection(): void {
		this.log("Disconnected from server");
		this.connected = false;

		this.stopHeartbeat();

		this.notifyDisconnectHandlers();
	}

	/**
	 * Notify disconnect handlers
	 */
	private notifyDisconnectHandlers(): void {
		for (const handler of this.disconnectHandlers) {
			try {
				handler();
			} catch (error) {
				this.log(`Error in disconnect handler: ${error}`);
			}
		}
	}

	/**
	 * Handle transport errors
	 */
	private handleError(error: Error): void {
		this.log(`Transport error: ${error.message}`);
		for (const handler of this.errorHandlers) {
			try {
				handler(error);
			} catch (err) {
				this.log(`Error in error handler: ${err}`);
			}
		}
	}

	/**
	 * Check client-side rate limit
	 * Returns true if message should be sent, false if rate limit exceeded
	 */
	private checkRateLimit(): boolean {
		if (this.config.maxMessagesPerSecond === 0) {
			return true; // Rate limiting disabled
		}

		const now = Date.now();
		const windowStart = Math.floor(now / 1000) * 1000;

		if (this.messageCountWindow !== windowStart) {
			this.messageCountWindow = windowStart;
			this.messageCount = 0;
		}

		if (this.messageCount >= this.config.maxMessagesPerSecond) {
			return false;
		}

		this.messageCount++;
		return true;
	}

	/**
	 * Debug logging
	 */
	private log(message: string): void {
		if (this.config.debug) {
			console.log(`[MarkerClientNetwork] ${message}`);
		}
	}
}
