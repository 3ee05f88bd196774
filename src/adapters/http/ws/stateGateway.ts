import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import WebSocket, { WebSocketServer } from 'ws';
import { createLogger } from '@/shared/logging/logger';
import type { CompositeState } from '@/domain/stack/compositeState';
import type { NotifierPort } from '@/ports/NotifierPort';
import type { StackSummary } from '@/application/stack/stackManager';

export type StackStateMessage = {
  type: 'stack_state';
  stackId: string;
  state: CompositeState;
};

/**
 * WebSocket feed of composite stack states on `/ws`. New clients receive the
 * current state of every stack, then one message per change.
 */
export class StateGateway implements NotifierPort {
  private readonly log = createLogger('Http', 'StateFeed');
  private readonly wsServer = new WebSocketServer({ noServer: true });
  private snapshot: () => StackSummary[] = () => [];

  constructor() {
    this.wsServer.on('connection', (socket) => {
      this.log.debug('state feed client connected', { clients: this.wsServer.clients.size });
      for (const stack of this.snapshot()) {
        this.sendTo(socket, { type: 'stack_state', stackId: stack.id, state: stack.state });
      }
    });
  }

  /** Source of the states replayed to newly connected clients. */
  public useSnapshot(snapshot: () => StackSummary[]): void {
    this.snapshot = snapshot;
  }

  public handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): boolean {
    const path = (request.url ?? '').split('?')[0];
    if (path !== '/ws') {
      return false;
    }
    this.wsServer.handleUpgrade(request, socket, head, (ws) => {
      this.wsServer.emit('connection', ws, request);
    });
    return true;
  }

  public notifyStackStateChanged(stackId: string, state: CompositeState): void {
    const message: StackStateMessage = { type: 'stack_state', stackId, state };
    for (const client of this.wsServer.clients) {
      this.sendTo(client, message);
    }
    this.log.spam('stack_state broadcast', { stackId, clients: this.wsServer.clients.size });
  }

  public close(): void {
    for (const client of this.wsServer.clients) {
      client.terminate();
    }
    this.wsServer.close();
  }

  private sendTo(socket: WebSocket, message: StackStateMessage): void {
    if (socket.readyState !== WebSocket.OPEN) {
      return;
    }
    socket.send(JSON.stringify(message), (error) => {
      if (error) {
        this.log.warn('state feed send failed', { stackId: message.stackId, message: error.message });
      }
    });
  }
}
