/**
 * Marker Sync
 *
 * Interactive markers kept in a server-side registry and mirrored by remote
 * observers through ordered diffs:
 * - Marker registry with staged changes and atomic, sequenced flushes
 * - Per-marker feedback handlers for observer interaction
 * - Wire packets and payload schemas for updates, feedback and snapshots
 * - Transport-agnostic server and observer bindings, with a `ws` adapter
 * - Event system, id generation and loop drivers
 */

// Marker registry
export * from "./markers";

// Core utilities
export * from "./core";

// Protocol layer for networking
export * from "./protocol";

// Networking layer (server/observer bindings)
export * from "./net";
