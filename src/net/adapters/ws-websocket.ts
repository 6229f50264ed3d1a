import WebSocket, { WebSocketServer, type RawData, type ServerOptions } from "ws";
import type { TransportAdapter, ServerTransportAdapter } from "../types";
import { generateId } from "../../core/generate-id/generate-id";

/**
 * Normalise the payload shapes `ws` delivers into one Uint8Array
 */
function toUint8Array(data: RawData): Uint8Array {
	if (Array.isArray(data)) {
		return Buffer.concat(data);
	}
	if (data instanceof ArrayBuffer) {
		return new Uint8Array(data);
	}
	return data;
}

/**
 * WebSocket transport adapter for client-side connections
 */
export class WsClientTransport implements TransportAdapter {
	private socket: WebSocket;
	private messageHandlers: Array<(data: Uint8Array) => void> = [];
	private closeHandlers: Array<() => void> = [];
	private errorHandlers: Array<(error: Error) => void> = [];

	constructor(socket: WebSocket) {
		this.socket = socket;
		this.setupHandlers();
	}

	send(data: Uint8Array): void {
		if (this.socket.readyState === WebSocket.OPEN) {
			this.socket.send(data);
		}
	}

	onMessage(handler: (data: Uint8Array) => void): void {
		this.messageHandlers.push(handler);
	}

	onClose(handler: () => void): void {
		this.closeHandlers.push(handler);
	}

	onError(handler: (error: Error) => void): void {
		this.errorHandlers.push(handler);
	}

	close(): void {
		this.socket.close();
	}

	private setupHandlers(): void {
		this.socket.binaryType = "nodebuffer";

		this.socket.on("message", (data, isBinary) => {
			if (!isBinary) {
				const error = new Error("Unexpected text message");
				for (const handler of this.errorHandlers) {
					handler(error);
				}
				return;
			}

			const bytes = toUint8Array(data);
			for (const handler of this.messageHandlers) {
				handler(bytes);
			}
		});

		this.socket.on("close", () => {
			for (const handler of this.closeHandlers) {
				handler();
			}
		});

		this.socket.on("error", (error) => {
			for (const handler of this.errorHandlers) {
				handler(error);
			}
		});
	}

	/**
	 * Static factory method to connect to a server
	 */
	static connect(url: string): Promise<WsClientTransport> {
		return new Promise((resolve, reject) => {
			const socket = new WebSocket(url);

			const onError = (error: Error) => {
				reject(error);
			};

			socket.once("error", onError);
			socket.once("open", () => {
				socket.off("error", onError);
				resolve(new WsClientTransport(socket));
			});
		});
	}
}

/**
 * WebSocket transport adapter for server-side peer connections.
 * `send` settles once `ws` has written the frame; the server binding counts
 * unsettled sends to detect backpressure.
 */
export class WsPeerTransport implements TransportAdapter {
	private socket: WebSocket;
	private messageHandlers: Array<(data: Uint8Array) => void> = [];
	private closeHandlers: Array<() => void> = [];
	private errorHandlers: Array<(error: Error) => void> = [];

	constructor(socket: WebSocket) {
		this.socket = socket;

		this.socket.on("message", (data, isBinary) => {
			if (!isBinary) {
				this.emitError(new Error("Unexpected text message"));
				return;
			}
			const bytes = toUint8Array(data);
			for (const handler of this.messageHandlers) {
				handler(bytes);
			}
		});

		this.socket.on("close", () => {
			for (const handler of this.closeHandlers) {
				handler();
			}
		});

		this.socket.on("error", (error) => {
			this.emitError(error);
		});
	}

	send(data: Uint8Array): Promise<void> {
		return new Promise((resolve, reject) => {
			if (this.socket.readyState !== WebSocket.OPEN) {
				reject(new Error("Socket is not open"));
				return;
			}
			this.socket.send(data, { binary: true }, (error) => {
				if (error) {
					reject(error);
				} else {
					resolve();
				}
			});
		});
	}

	onMessage(handler: (data: Uint8Array) => void): void {
		this.messageHandlers.push(handler);
	}

	onClose(handler: () => void): void {
		this.closeHandlers.push(handler);
	}

	onError(handler: (error: Error) => void): void {
		this.errorHandlers.push(handler);
	}

	close(): void {
		this.socket.close();
	}

	private emitError(error: Error): void {
		for (const handler of this.errorHandlers) {
			handler(error);
		}
	}
}

/**
 * WebSocket server transport adapter on top of a `ws` server
 */
export class WsServerTransport implements ServerTransportAdapter<WsPeerTransport> {
	private server: WebSocketServer;
	private peers = new Map<string, WsPeerTransport>();

	private connectionHandlers: Array<(peer: WsPeerTransport, peerId: string) => void> = [];
	private disconnectionHandlers: Array<(peerId: string) => void> = [];

	constructor(server: WebSocketServer) {
		this.server = server;
		this.server.on("connection", (socket) => {
			this.registerPeer(socket);
		});
	}

	onConnection(handler: (peer: WsPeerTransport, peerId: string) => void): void {
		this.connectionHandlers.push(handler);
	}

	onDisconnection(handler: (peerId: string) => void): void {
		this.disconnectionHandlers.push(handler);
	}

	getPeer(peerId: string): WsPeerTransport | undefined {
		return this.peers.get(peerId);
	}

	getPeerIds(): string[] {
		return Array.from(this.peers.keys());
	}

	/**
	 * Close every connection and stop listening
	 */
	close(): Promise<void> {
		for (const socket of this.server.clients) {
			socket.terminate();
		}
		this.peers.clear();

		return new Promise((resolve, reject) => {
			this.server.close((error) => {
				if (error) {
					reject(error);
				} else {
					resolve();
				}
			});
		});
	}

	private registerPeer(socket: WebSocket): void {
		const peerId = generateId({ prefix: "peer_" });
		const peer = new WsPeerTransport(socket);
		this.peers.set(peerId, peer);

		socket.on("close", () => {
			if (this.peers.delete(peerId)) {
				for (const handler of this.disconnectionHandlers) {
					handler(peerId);
				}
			}
		});

		for (const handler of this.connectionHandlers) {
			handler(peer, peerId);
		}
	}

	/**
	 * Static factory method to start a WebSocket server
	 */
	static create(options: ServerOptions): WsServerTransport {
		return new WsServerTransport(new WebSocketServer(options));
	}
}
