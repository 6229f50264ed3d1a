import type { InteractiveMarkerServer } from "../markers/interactive-marker-server";
import type { InteractiveMarkerUpdate } from "../markers/types";
import { decodePacket, encodePacket } from "../protocol/packets";
import { FeedbackSchema, GetMarkersRequestSchema, type GetMarkersResponse } from "../protocol/schemas";
import { TimeoutDriver } from "../core/loop/drivers";
import type { LoopDriver } from "../core/loop/loop";
import type { FeedbackValidator } from "./validators";
import {
	MessageType,
	type PeerState,
	type ServerNetworkConfig,
	type ServerTransportAdapter,
	type TransportAdapter,
} from "./types";

/**
 * Configuration for MarkerServerNetwork
 */
export interface MarkerServerNetworkConfig<TPeer extends TransportAdapter> {
	/** Marker registry whose updates are published */
	server: InteractiveMarkerServer;

	/** Transport adapter for managing peer connections */
	transport: ServerTransportAdapter<TPeer>;

	/** Checked before feedback reaches the marker server (optional) */
	feedbackValidator?: FeedbackValidator;

	/** Network configuration */
	config?: ServerNetworkConfig;
}

/**
 * Binds an {@link InteractiveMarkerServer} to a set of observer connections.
 *
 * Every published update is encoded once and sent to every connected peer.
 * Each peer has a FIFO send queue used while its transport is backpressured,
 * so peers receive updates in sequence order; when the queue overflows the
 * oldest message is dropped and the observer recovers by asking for the
 * markers again.
 *
 * Inbound feedback is rate limited, schema checked, passed through the
 * optional validator and then handed to `processFeedback`. Snapshot requests
 * are answered with the committed markers and their sequence number.
 *
 * @template TPeer The transport adapter type for peer connections
 *
 * @example
 * ```ts
 * const markers = new InteractiveMarkerServer({ topicNamespace: "basic_controls" });
 * const network = new MarkerServerNetwork({
 *   server: markers,
 *   transport: WsServerTransport.create({ port: 8080 }),
 *   feedbackValidator: validatePoseFinite(),
 *   config: { publishInterval: 50 },
 * });
 *
 * markers.insert(marker); // published on the next tick
 * ```
 */
export class MarkerServerNetwork<TPeer extends TransportAdapter = TransportAdapter> {
	readonly server: InteractiveMarkerServer;
	private transport: ServerTransportAdapter<TPeer>;
	private feedbackValidator?: FeedbackValidator;
	private config: Required<ServerNetworkConfig>;

	/** Per-peer state tracking */
	private peers = new Map<string, PeerState>();

	/** Connection lifecycle handlers */
	private connectionHandlers: Array<(peerId: string) => void> = [];
	private disconnectionHandlers: Array<(peerId: string) => void> = [];

	/** Heartbeat interval timer */
	private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

	/** Drives `applyChanges()` when publishInterval is set */
	private publishDriver: LoopDriver | null = null;

	private unsubscribeUpdates: () => void;

	constructor(config: MarkerServerNetworkConfig<TPeer>) {
		this.server = config.server;
		this.transport = config.transport;
		this.feedbackValidator = config.feedbackValidator;
		this.config = {
			maxMessageSize: config.config?.maxMessageSize ?? 65536,
			debug: config.config?.debug ?? false,
			maxMessagesPerSecond: config.config?.maxMessagesPerSecond ?? 100,
			maxSendQueueSize: config.config?.maxSendQueueSize ?? 100,
			heartbeatInterval: config.config?.heartbeatInterval ?? 30000,
			heartbeatTimeout: config.config?.heartbeatTimeout ?? 60000,
			publishInterval: config.config?.publishInterval ?? 0,
			maxInFlight: config.config?.maxInFlight ?? 16,
		};

		this.unsubscribeUpdates = this.server.onUpdate((update) => {
			this.broadcastUpdate(update);
		});

		this.setupTransportHandlers();
		this.setupHeartbeat();
		this.setupPublishLoop();
	}

	/**
	 * Register a handler for new connections
	 */
	onConnection(handler: (peerId: string) => void): void {
		this.connectionHandlers.push(handler);
	}

	/**
	 * Register a handler for disconnections
	 */
	onDisconnection(handler: (peerId: string) => void): void {
		this.disconnectionHandlers.push(handler);
	}

	/**
	 * Get all connected peer IDs
	 */
	getPeerIds(): string[] {
		return Array.from(this.peers.keys());
	}

	/**
	 * Get peer state for a specific peer
	 */
	getPeerState(peerId: string): PeerState | undefined {
		return this.peers.get(peerId);
	}

	/**
	 * Get bandwidth usage for a peer (bytes per second in current window)
	 */
	getPeerBandwidth(peerId: string): number {
		const peer = this.peers.get(peerId);
		return peer ? peer.bytesSent : 0;
	}

	/**
	 * Get total bandwidth usage across all peers
	 */
	getTotalBandwidth(): number {
		let total = 0;
		for (const peer of this.peers.values()) {
			total += peer.bytesSent;
		}
		return total;
	}

	/**
	 * Check if a peer is experiencing backpressure
	 */
	isPeerBackpressured(peerId: string): boolean {
		const peer = this.peers.get(peerId);
		return peer ? peer.isBackpressured || peer.sendQueue.length > 0 : false;
	}

	/**
	 * Stop publishing and close the transport with all its connections
	 */
	close(): void | Promise<void> {
		this.log("Closing server...");

		if (this.publishDriver) {
			this.publishDriver.stop();
			this.publishDriver = null;
		}

		if (this.heartbeatTimer) {
			clearInterval(this.heartbeatTimer);
			this.heartbeatTimer = null;
		}

		this.unsubscribeUpdates();

		return this.transport.close();
	}

	/**
	 * Encode an update once and send it to every peer
	 */
	private broadcastUpdate(update: InteractiveMarkerUpdate): void {
		let message: Uint8Array;
		try {
			message = encodePacket(MessageType.UPDATE, update);
		} catch (error) {
			this.log(`Failed to encode update ${update.seqNum}: ${error}`);
			return;
		}

		for (const peer of this.peers.values()) {
			this.sendToPeer(peer, message);
			peer.lastBroadcastSeq = update.seqNum;
		}

		this.log(`Broadcast update ${update.seqNum} (${message.byteLength} bytes) to ${this.peers.size} peers`);
	}

	/**
	 * Send now, or queue behind earlier messages while the peer is backpressured
	 */
	private sendToPeer(peer: PeerState, message: Uint8Array): void {
		if (peer.isBackpressured || peer.sendQueue.length > 0) {
			this.queueMessage(peer, message);
			return;
		}

		this.sendMessageToPeer(peer, message);
	}

	/**
	 * Append to the peer's queue, dropping the oldest message when full
	 */
	private queueMessage(peer: PeerState, message: Uint8Array): void {
		if (peer.sendQueue.length >= this.config.maxSendQueueSize) {
			peer.sendQueue.shift();
			this.log(`Send queue full for peer ${peer.peerId}, dropping oldest message`);
		}

		peer.sendQueue.push(message);
	}

	/**
	 * Put a message that failed to send back at the head of the queue
	 */
	private requeueMessage(peer: PeerState, message: Uint8Array): void {
		if (peer.sendQueue.length >= this.config.maxSendQueueSize) {
			this.log(`Send queue full for peer ${peer.peerId}, dropping failed message`);
			return;
		}

		peer.sendQueue.unshift(message);
	}

	/**
	 * Hand a message to the peer's transport and track bandwidth.
	 * A failed send marks the peer backpressured and requeues the message.
	 */
	private sendMessageToPeer(peer: PeerState, message: Uint8Array): void {
		this.trackBandwidth(peer, message.byteLength);

		let sendResult: void | Promise<void>;
		try {
			sendResult = peer.transport.send(message);
		} catch (error) {
			peer.isBackpressured = true;
			this.requeueMessage(peer, message);
			this.log(`Send failed for peer ${peer.peerId}, marking as backpressured: ${error}`);
			return;
		}

		if (sendResult instanceof Promise) {
			peer.inFlight++;
			if (peer.inFlight >= this.config.maxInFlight) {
				peer.isBackpressured = true;
				this.log(`Peer ${peer.peerId} has ${peer.inFlight} unsettled sends, marking as backpressured`);
			}

			sendResult
				.then(() => {
					peer.inFlight--;
					this.flushSendQueue(peer.peerId);
				})
				.catch((error: unknown) => {
					peer.inFlight = Math.max(0, peer.inFlight - 1);
					peer.isBackpressured = true;
					this.requeueMessage(peer, message);
					this.log(`Send failed for peer ${peer.peerId}, marking as backpressured: ${error}`);
				});
		}
	}

	/**
	 * Flush send queue for a peer, oldest first
	 */
	private flushSendQueue(peerId: string): void {
		const peer = this.peers.get(peerId);
		if (!peer) {
			return;
		}

		if (peer.inFlight >= this.config.maxInFlight) {
			return;
		}

		peer.isBackpressured = false;
		if (peer.sendQueue.length === 0) {
			return;
		}

		// Bounded per flush so one slow peer cannot monopolise the event loop
		const maxMessagesPerFlush = 10;
		let sent = 0;

		while (peer.sendQueue.length > 0 && sent < maxMessagesPerFlush) {
			const message = peer.sendQueue.shift();
			if (!message) {
				break;
			}
			this.sendMessageToPeer(peer, message);
			sent++;

			if (peer.isBackpressured) {
				break;
			}
		}

		if (peer.sendQueue.length > 0) {
			this.log(`Peer ${peerId} still has ${peer.sendQueue.length} queued messages`);
		}
	}

	/**
	 * Track bandwidth usage for a peer
	 */
	private trackBandwidth(peer: PeerState, bytes: number): void {
		const now = Date.now();
		const windowStart = Math.floor(now / 1000) * 1000;

		if (peer.bandwidthWindow !== windowStart) {
			peer.bandwidthWindow = windowStart;
			peer.bytesSent = 0;
		}

		peer.bytesSent += bytes;
	}

	/**
	 * Setup transport event handlers
	 */
	private setupTransportHandlers(): void {
		this.transport.onConnection((peer, peerId) => {
			this.handleConnection(peer, peerId);
		});

		this.transport.onDisconnection((peerId) => {
			this.handleDisconnection(peerId);
		});
	}

	/**
	 * Setup heartbeat mechanism
	 */
	private setupHeartbeat(): void {
		if (this.config.heartbeatInterval === 0) {
			return; // Heartbeats disabled
		}

		this.heartbeatTimer = setInterval(() => {
			this.checkHeartbeats();
		}, this.config.heartbeatInterval);
	}

	/**
	 * Start the timed flush loop
	 */
	private setupPublishLoop(): void {
		if (this.config.publishInterval === 0) {
			return;
		}

		this.publishDriver = new TimeoutDriver(() => {
			this.server.applyChanges();
		}, this.config.publishInterval);
		this.publishDriver.start();
	}

	/**
	 * Close silent peers, ping the rest and retry stalled send queues
	 */
	private checkHeartbeats(): void {
		const now = Date.now();
		const heartbeatMessage = encodePacket(MessageType.HEARTBEAT);

		for (const [peerId, peer] of this.peers.entries()) {
			const timeSinceLastMessage = now - peer.lastMessageReceivedAt;
			if (timeSinceLastMessage > this.config.heartbeatTimeout) {
				this.log(`Peer ${peerId} timed out (no message for ${timeSinceLastMessage}ms)`);
				// Triggers handleDisconnection through the transport
				this.closePeer(peer);
				continue;
			}

			if (peer.isBackpressured && peer.inFlight === 0) {
				this.flushSendQueue(peerId);
			}

			this.sendToPeer(peer, heartbeatMessage);
		}
	}

	private closePeer(peer: PeerState): void {
		try {
			const result = peer.transport.close();
			if (result instanceof Promise) {
				result.catch((error: unknown) => {
					this.log(`Failed to close peer ${peer.peerId}: ${error}`);
				});
			}
		} catch (error) {
			this.log(`Failed to close peer ${peer.peerId}: ${error}`);
		}
	}

	/**
	 * Handle new peer connection
	 */
	private handleConnection(peer: TPeer, peerId: string): void {
		this.log(`Peer connected: ${peerId}`);

		const now = Date.now();
		const peerState: PeerState = {
			peerId,
			transport: peer,
			lastBroadcastSeq: 0,
			connectedAt: now,
			messageCount: 0,
			messageCountWindow: now,
			sendQueue: [],
			inFlight: 0,
			bytesSent: 0,
			bandwidthWindow: now,
			isBackpressured: false,
			lastMessageReceivedAt: now,
		};

		this.peers.set(peerId, peerState);

		peer.onMessage((data) => {
			this.handlePeerMessage(peerId, data);
		});

		if (peer.onError) {
			peer.onError((error) => {
				this.log(`Transport error for peer ${peerId}: ${error.message}`);
			});
		}

		for (const handler of this.connectionHandlers) {
			try {
				handler(peerId);
			} catch (error) {
				this.log(`Error in connection handler: ${error}`);
			}
		}
	}

	/**
	 * Handle peer disconnection
	 */
	private handleDisconnection(peerId: string): void {
		this.log(`Peer disconnected: ${peerId}`);

		this.peers.delete(peerId);

		for (const handler of this.disconnectionHandlers) {
			try {
				handler(peerId);
			} catch (error) {
				this.log(`Error in disconnection handler: ${error}`);
			}
		}
	}

	/**
	 * Handle incoming message from a peer
	 */
	private handlePeerMessage(peerId: string, data: Uint8Array): void {
		const peer = this.peers.get(peerId);
		if (!peer) {
			this.log(`Message from unknown peer ${peerId}, ignoring`);
			return;
		}
		peer.lastMessageReceivedAt = Date.now();

		if (data.byteLength === 0) {
			this.log(`Received empty message from peer ${peerId}`);
			return;
		}

		if (data.byteLength > this.config.maxMessageSize) {
			this.log(`Message from peer ${peerId} exceeds max size: ${data.byteLength} > ${this.config.maxMessageSize}`);
			return;
		}

		const messageType = data[0];

		switch (messageType) {
			case MessageType.FEEDBACK:
				this.handleFeedback(peer, data);
				break;
			case MessageType.GET_MARKERS:
				this.handleGetMarkers(peer, data);
				break;
			case MessageType.HEARTBEAT:
				// lastMessageReceivedAt already updated
				this.log(`Received heartbeat from peer ${peerId}`);
				break;
			default:
				this.log(`Unknown message type ${messageType} from peer ${peerId}`);
		}
	}

	/**
	 * Validate observer feedback and route it to the marker server
	 */
	private handleFeedback(peer: PeerState, data: Uint8Array): void {
		if (!this.checkRateLimit(peer)) {
			this.log(`Rate limit exceeded for peer ${peer.peerId}, dropping feedback`);
			return;
		}

		const payload = this.decodePayload(peer, data);
		if (payload === undefined) {
			return;
		}

		const parsed = FeedbackSchema.safeParse(payload);
		if (!parsed.success) {
			this.log(`Invalid feedback from peer ${peer.peerId}: ${parsed.error.message}`);
			return;
		}

		const feedback = parsed.data;
		if (this.feedbackValidator && !this.feedbackValidator(peer.peerId, feedback)) {
			this.log(`Feedback validation failed for peer ${peer.peerId}, marker '${feedback.markerName}'`);
			return;
		}

		this.log(`Received feedback (event: ${feedback.eventType}, marker: '${feedback.markerName}') from peer ${peer.peerId}`);
		this.server.processFeedback(feedback);
	}

	/**
	 * Answer a snapshot request with the committed markers
	 */
	private handleGetMarkers(peer: PeerState, data: Uint8Array): void {
		if (!this.checkRateLimit(peer)) {
			this.log(`Rate limit exceeded for peer ${peer.peerId}, dropping marker request`);
			return;
		}

		const payload = this.decodePayload(peer, data);
		if (payload === undefined) {
			return;
		}

		const parsed = GetMarkersRequestSchema.safeParse(payload);
		if (!parsed.success) {
			this.log(`Invalid marker request from peer ${peer.peerId}: ${parsed.error.message}`);
			return;
		}

		const snapshot = this.server.getInteractiveMarkers();
		const response: GetMarkersResponse = {
			requestId: parsed.data.requestId,
			sequenceNumber: snapshot.sequenceNumber,
			markers: snapshot.markers,
		};

		try {
			this.sendToPeer(peer, encodePacket(MessageType.MARKERS, response));
			this.log(`Sent ${snapshot.markers.length} markers at sequence ${snapshot.sequenceNumber} to peer ${peer.peerId}`);
		} catch (error) {
			this.log(`Failed to send markers to peer ${peer.peerId}: ${error}`);
		}
	}

	/**
	 * Decode a packet body, logging and returning undefined when it is unreadable
	 */
	private decodePayload(peer: PeerState, data: Uint8Array): unknown {
		try {
			return decodePacket(data).payload;
		} catch (error) {
			this.log(`Failed to decode message from peer ${peer.peerId}: ${error}`);
			return undefined;
		}
	}

	/**
	 * Check rate limit for a peer
	 * Returns true if message should be processed, false if rate limit exceeded
	 */
	private checkRateLimit(peer: PeerState): boolean {
		if (this.config.maxMessagesPerSecond === 0) {
			return true; // Rate limiting disabled
		}

		const now = Date.now();
		const windowStart = Math.floor(now / 1000) * 1000;

		if (peer.messageCountWindow !== windowStart) {
			peer.messageCountWindow = windowStart;
			peer.messageCount = 0;
		}

		if (peer.messageCount >= this.config.maxMessagesPerSecond) {
			return false;
		}

		peer.messageCount++;
		return true;
	}

	/**
	 * Debug logging
	 */
	private log(message: string): void {
		if (this.config.debug) {
			console.log(`[MarkerServerNetwork] ${message}`);
		}
	}
}
