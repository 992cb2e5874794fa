/**
 * @fileoverview Per-connection session actor.
 *
 * A session owns one transport connection. It registers itself with the
 * store, forwards inbound text once it knows its player id and writes
 * every message the store publishes to the connection.
 *
 * Lifecycle: initializing → active(playerId) → closed. A connection that
 * closes before the store has assigned an id goes through `closing` and
 * is deleted as soon as the id arrives.
 */

import type { StoreInbox } from '../game/GameStore.js';
import type { PlayerId, SessionHandle } from '../game/types.js';
import { type ServerMessage, serializeServerMessage } from '../protocol/messages.js';
import { logger } from '../utils/logger.js';

/**
 * WebSocket-like interface for connection abstraction.
 * Allows testing without real WebSocket connections.
 */
export interface Connection {
  /** Send a message to this connection */
  send(data: string): void;
  /** Close this connection */
  close(): void;
  /** Connection state (1 = OPEN) */
  readonly readyState: number;
  /** WebSocket OPEN constant */
  readonly OPEN: number;
}

export type SessionStatus =
  | { readonly type: 'initializing'; readonly buffered: readonly string[] }
  | { readonly type: 'closing' }
  | { readonly type: 'active'; readonly playerId: PlayerId }
  | { readonly type: 'closed' };

export class Session implements SessionHandle {
  private status: SessionStatus = { type: 'initializing', buffered: [] };

  constructor(
    private readonly connection: Connection,
    private readonly store: StoreInbox
  ) {}

  /**
   * Ask the store to register this session as a new player.
   */
  start(): void {
    this.store.dispatch({ type: 'create', session: this });
  }

  /**
   * Inbound text frame from the transport.
   */
  handleMessage(text: string): void {
    switch (this.status.type) {
      case 'initializing':
        this.status = { type: 'initializing', buffered: [...this.status.buffered, text] };
        return;
      case 'active':
        this.store.dispatch({ type: 'receive', playerId: this.status.playerId, text });
        return;
      case 'closing':
      case 'closed':
        logger.debug('Message after close ignored');
        return;
    }
  }

  /**
   * The transport connection went away.
   */
  handleClose(): void {
    switch (this.status.type) {
      case 'initializing':
        this.status = { type: 'closing' };
        return;
      case 'active': {
        const { playerId } = this.status;
        this.status = { type: 'closed' };
        this.store.dispatch({ type: 'delete', playerId });
        return;
      }
      case 'closing':
      case 'closed':
        return;
    }
  }

  /**
   * Outbound message from the store.
   */
  publish(message: ServerMessage): void {
    if (message.type === 'connected') {
      this.activate(message.id, message);
      return;
    }
    if (this.status.type === 'active') {
      this.write(message);
    }
  }

  get playerId(): PlayerId | null {
    return this.status.type === 'active' ? this.status.playerId : null;
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  private activate(playerId: PlayerId, connected: ServerMessage): void {
    switch (this.status.type) {
      case 'initializing': {
        const { buffered } = this.status;
        this.status = { type: 'active', playerId };
        this.write(connected);
        for (const text of buffered) {
          this.store.dispatch({ type: 'receive', playerId, text });
        }
        return;
      }
      case 'closing':
        this.status = { type: 'closed' };
        this.store.dispatch({ type: 'delete', playerId });
        return;
      case 'active':
      case 'closed':
        logger.warn('Unexpected connected message', { playerId, status: this.status.type });
        return;
    }
  }

  private write(message: ServerMessage): void {
    if (this.connection.readyState === this.connection.OPEN) {
      this.connection.send(serializeServerMessage(message));
    }
  }
}
