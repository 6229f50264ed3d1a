/**
 * @module net
 *
 * Transport-agnostic networking layer for interactive markers
 *
 * Generic server/observer bindings that work with any transport layer
 * implementing {@link TransportAdapter}. A `ws` adapter is included.
 *
 * @example
 * ```typescript
 * import { InteractiveMarkerServer } from './markers';
 * import { MarkerServerNetwork, MarkerClientNetwork, WsServerTransport, WsClientTransport } from './net';
 *
 * // Server side
 * const markers = new InteractiveMarkerServer({ topicNamespace: 'simple_marker' });
 * const network = new MarkerServerNetwork({
 *   server: markers,
 *   transport: WsServerTransport.create({ port: 8080 }),
 * });
 * markers.insert(marker);
 * markers.applyChanges(); // sent to every connected observer
 *
 * // Observer side
 * const client = new MarkerClientNetwork({
 *   transport: await WsClientTransport.connect('ws://localhost:8080'),
 * });
 * client.on('markerUpdated', (marker) => console.log(marker.name, marker.pose));
 * ```
 */

export * from "./types";
export * from "./server";
export * from "./client";
export * from "./adapters/ws-websocket";
export * from "./validators";
