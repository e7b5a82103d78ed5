import type { Counters } from '../metrics/counters.js';
import type { BoardStorage } from '../persistence/board-store.js';
import type { SessionCoordinator } from '../session/session-coordinator.js';
import type { ConnectionManager } from '../transport/connection-manager.js';
import type { SessionMetrics } from '../types.js';

export interface BoardContext {
  port: number;
  coordinator: SessionCoordinator;
  connectionManager: ConnectionManager;
  counters: Counters;
  boards: BoardStorage;
  getMetrics: () => SessionMetrics;
}
