export interface ConnectionState {
  connId: string;
  participantId?: string;
  connectedAt: number;
  remoteAddress?: string;
}

export class ConnectionManager {
  private readonly connections = new Map<string, ConnectionState>();

  registerConnection(connId: string, remoteAddress: string | undefined, now: number): ConnectionState {
    const conn: ConnectionState = { connId, connectedAt: now, remoteAddress };
    this.connections.set(connId, conn);
    return conn;
  }

  unregisterConnection(connId: string): ConnectionState | undefined {
    const conn = this.connections.get(connId);
    this.connections.delete(connId);
    return conn;
  }

  bindConnectionToParticipant(connId: string, participantId: string): void {
    const conn = this.connections.get(connId);
    if (conn) conn.participantId = participantId;
  }

  size(): number { return this.connections.size; }
}
