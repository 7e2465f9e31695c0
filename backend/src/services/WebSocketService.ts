import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { FleetSummary, UpdateOutcome } from '../types/Update';

interface TrackedSocket extends WebSocket {
  isAlive?: boolean;
}

export interface ProgressBroadcaster {
  broadcastFleetStarted(runTrigger: string, deviceCount: number): void;
  broadcastOutcome(outcome: UpdateOutcome, index: number): void;
  broadcastFleetCompleted(summary: FleetSummary): void;
}

export class WebSocketService implements ProgressBroadcaster {
  private wss: WebSocketServer;
  private connections = new Set<TrackedSocket>();
  private heartbeatInterval: ReturnType<typeof setInterval> | null = null;

  constructor(server: HttpServer) {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws: TrackedSocket) => {
      this.handleConnection(ws);
    });

    // Heartbeat every 30 seconds
    this.heartbeatInterval = setInterval(() => {
      for (const sock of this.connections) {
        if (sock.isAlive === false) {
          this.connections.delete(sock);
          sock.terminate();
          continue;
        }
        sock.isAlive = false;
        sock.ping();
      }
    }, 30000);
  }

  private handleConnection(ws: TrackedSocket): void {
    ws.isAlive = true;
    this.connections.add(ws);

    ws.on('pong', () => {
      ws.isAlive = true;
    });

    ws.on('close', () => {
      this.connections.delete(ws);
    });

    ws.send(JSON.stringify({ type: 'connected' }));
  }

  broadcastFleetStarted(runTrigger: string, deviceCount: number): void {
    this.broadcast({ type: 'fleet.started', data: { trigger: runTrigger, devices: deviceCount } });
  }

  broadcastOutcome(outcome: UpdateOutcome, index: number): void {
    this.broadcast({ type: 'device.outcome', data: { index, outcome } });
  }

  broadcastFleetCompleted(summary: FleetSummary): void {
    this.broadcast({ type: 'fleet.completed', data: summary });
  }

  private broadcast(message: { type: string; data: unknown }): void {
    const payload = JSON.stringify(message);
    for (const ws of this.connections) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(payload);
      }
    }
  }

  close(): void {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }
    for (const ws of this.connections) {
      ws.terminate();
    }
    this.connections.clear();
    this.wss.close();
  }

  getConnectionCount(): number {
    return this.connections.size;
  }
}
