/**
 * Hostlink
 *
 * Networking and state lifecycle for small multiplayer games:
 * - Binary codecs for compact message payloads
 * - Message types with a shared, ordered registry
 * - Client, server and host-mode transports behind one network manager
 * - Game state machines with fade and resource-loading transitions
 */

// Core utilities
export * from "./core";

// Message definitions and registry
export * from "./protocol";

// Networking layer
export * from "./net";

// Game state lifecycle
export * from "./state";
