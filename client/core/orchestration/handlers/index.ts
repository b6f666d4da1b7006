/**
 * Orchestrator Handlers - Action Implementations
 *
 * Each handler implements one action on the editor state. Handlers are grouped by what
 * they act on: node, edge, canvas. Mode routers translate keys into handler calls;
 * pointer routing crosses modes and lives on its own.
 *
 * Handlers mutate the state they are given and never perform I/O.
 */

// Node handlers
export * from './node';

// Edge handlers
export * from './edge';

// Canvas handlers
export * from './canvas';

// Keyboard routing per mode
export * from './mode';

// Pointer routing
export * from './pointer';
