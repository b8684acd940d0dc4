import { EventBus, createEvent } from './eventBus.js';
import type { ConnectionStatus, ConnectionStatusChange, ConnectionType } from './types.js';

/**
 * Last known status of each outbound connection. Every change is also
 * published on the bus as `connection-status-changed`.
 */
export class ConnectionMonitor {
  private statuses = new Map<ConnectionType, ConnectionStatusChange>();

  constructor(private readonly bus: EventBus) {}

  updateStatus(connectionType: ConnectionType, status: ConnectionStatus, details: string | null = null): void {
    const change: ConnectionStatusChange = {
      connection_type: connectionType,
      status,
      timestamp: Math.floor(Date.now() / 1000),
      details,
    };
    const previous = this.statuses.get(connectionType);
    this.statuses.set(connectionType, change);

    if (previous?.status !== status) {
      const suffix = details ? ` (${details})` : '';
      console.log(`[Connections] ${connectionType}: ${previous?.status ?? 'Unknown'} -> ${status}${suffix}`);
    }
    this.bus.publish(createEvent('connection-status-changed', change));
  }

  getStatus(connectionType: ConnectionType): ConnectionStatusChange | undefined {
    return this.statuses.get(connectionType);
  }

  getAll(): ConnectionStatusChange[] {
    return Array.from(this.statuses.values());
  }
}
