/**
 * Core networking types for transport-agnostic marker synchronisation
 */

/**
 * Generic transport adapter interface - implement this to support any transport layer
 * (WebSocket, WebRTC, a message broker, an in-process pipe, etc.)
 */
export interface TransportAdapter {
	/**
	 * Send binary data through the transport.
	 * A returned promise settles when the data has been handed to the network.
	 */
	send(data: Uint8Array): void | Promise<void>;

	/**
	 * Register a callback for incoming binary data
	 */
	onMessage(handler: (data: Uint8Array) => void): void;

	/**
	 * Register a callback for connection close/disconnect
	 */
	onClose(handler: () => void): void;

	/**
	 * Register a callback for transport errors (optional)
	 */
	onError?(handler: (error: Error) => void): void;

	/**
	 * Close the connection
	 */
	close(): void | Promise<void>;
}

/**
 * Server-side transport adapter - manages multiple peer connections
 */
export interface ServerTransportAdapter<TPeer extends TransportAdapter> {
	/**
	 * Register a callback for new peer connections
	 */
	onConnection(handler: (peer: TPeer, peerId: string) => void): void;

	/**
	 * Register a callback for peer disconnections
	 */
	onDisconnection(handler: (peerId: string) => void): void;

	/**
	 * Get a specific peer connection by ID
	 */
	getPeer(peerId: string): TPeer | undefined;

	/**
	 * Get all connected peer IDs
	 */
	getPeerIds(): string[];

	/**
	 * Close the server and all connections
	 */
	close(): void | Promise<void>;
}

/**
 * First byte of every wire message
 */
export enum MessageType {
	/** Server -> Observer: one published diff */
	UPDATE = 0x01,
	/** Observer -> Server: interaction feedback */
	FEEDBACK = 0x02,
	/** Bidirectional: Heartbeat/ping, no body */
	HEARTBEAT = 0x03,
	/** Observer -> Server: request for the committed markers */
	GET_MARKERS = 0x04,
	/** Server -> Observer: answer to GET_MARKERS */
	MARKERS = 0x05,
}

/**
 * Configuration for network message handling
 */
export interface NetworkConfig {
	/**
	 * Maximum inbound message size in bytes (default: 64KB)
	 */
	maxMessageSize?: number;

	/**
	 * Enable debug logging
	 */
	debug?: boolean;

	/**
	 * Maximum inbound messages per second (default: 100 per peer on the server, 60 on the client)
	 * Set to 0 to disable rate limiting
	 */
	maxMessagesPerSecond?: number;

	/**
	 * Maximum send queue size per peer (default: 100)
	 * When exceeded, the oldest queued message is dropped.
	 * On the client it bounds the updates buffered while waiting for markers.
	 */
	maxSendQueueSize?: number;

	/**
	 * Heartbeat interval in milliseconds (default: 30000 = 30s)
	 * Set to 0 to disable heartbeats
	 */
	heartbeatInterval?: number;

	/**
	 * Heartbeat timeout in milliseconds (default: 60000 = 60s)
	 * If no message received within this time, connection is considered dead
	 */
	heartbeatTimeout?: number;
}

/**
 * Server-side network configuration
 */
export interface ServerNetworkConfig extends NetworkConfig {
	/**
	 * Milliseconds between automatic `applyChanges()` calls (default: 0)
	 * Set to 0 to flush only when the application calls `applyChanges()`
	 */
	publishInterval?: number;

	/**
	 * Unsettled sends allowed per peer before it is treated as backpressured (default: 16)
	 * Only counts transports whose `send` returns a promise. Further messages wait
	 * in the send queue, which `maxSendQueueSize` bounds.
	 */
	maxInFlight?: number;
}

/**
 * Per-peer state tracking on the server
 */
export interface PeerState {
	/** Unique peer identifier */
	peerId: string;

	/** Transport connection for this peer */
	transport: TransportAdapter;

	/** Sequence number of the last update broadcast to this peer, sent or queued */
	lastBroadcastSeq: number;

	/** Connection timestamp */
	connectedAt: number;

	/** Rate limiting: message count in current second */
	messageCount: number;

	/** Rate limiting: timestamp of current second window */
	messageCountWindow: number;

	/** Messages waiting for the transport, oldest first */
	sendQueue: Uint8Array[];

	/** Sends handed to an async transport that have not settled yet */
	inFlight: number;

	/** Bandwidth tracking: bytes sent in current second */
	bytesSent: number;

	/** Bandwidth tracking: timestamp of current second window */
	bandwidthWindow: number;

	/** Flag to indicate if peer is experiencing backpressure */
	isBackpressured: boolean;

	/** Last time we received any message from this peer */
	lastMessageReceivedAt: number;
}
