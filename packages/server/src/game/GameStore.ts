import {
  errorFor,
  handleMessage,
  type Outbound,
  roundResultsFor,
} from '../protocol/handlers.js';
import { decodeClientMessage } from '../protocol/messages.js';
import { logger } from '../utils/logger.js';
import { MESSAGE_UNDECODABLE } from './errors.js';
import {
  DEFAULT_MATCH_RULES,
  IDLE,
  type MatchRules,
  type PlayerId,
  type SessionHandle,
} from './types.js';
import { World } from './World.js';

/**
 * Everything the store reacts to. Sessions are the only producers.
 */
export type StoreEvent =
  | { readonly type: 'create'; readonly session: SessionHandle }
  | { readonly type: 'delete'; readonly playerId: PlayerId }
  | { readonly type: 'receive'; readonly playerId: PlayerId; readonly text: string };

/**
 * The part of the store a session talks to.
 */
export interface StoreInbox {
  dispatch(event: StoreEvent): void;
}

export interface GameStoreConfig {
  /** Starting values for new matches */
  rules: MatchRules;
  /** End a live match as a loss for a player who disconnects */
  forfeitOnDisconnect: boolean;
}

const DEFAULT_STORE_CONFIG: GameStoreConfig = {
  rules: DEFAULT_MATCH_RULES,
  forfeitOnDisconnect: false,
};

/**
 * Single owner of all players and matches.
 *
 * Events go into a FIFO mailbox and are processed one at a time. An event
 * dispatched while another is being processed (a session reacting to a
 * publish, for instance) waits until the current one is fully applied.
 */
export class GameStore implements StoreInbox {
  private state: World;
  private readonly config: GameStoreConfig;
  private readonly mailbox: StoreEvent[] = [];
  private draining = false;

  constructor(config: Partial<GameStoreConfig> = {}) {
    this.config = { ...DEFAULT_STORE_CONFIG, ...config };
    this.state = World.create(this.config.rules);
  }

  dispatch(event: StoreEvent): void {
    this.mailbox.push(event);
    if (this.draining) {
      return;
    }

    this.draining = true;
    try {
      let next = this.mailbox.shift();
      while (next) {
        this.process(next);
        next = this.mailbox.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private process(event: StoreEvent): void {
    try {
      switch (event.type) {
        case 'create':
          this.handleCreate(event.session);
          break;
        case 'delete':
          this.handleDelete(event.playerId);
          break;
        case 'receive':
          this.handleReceive(event.playerId, event.text);
          break;
      }
    } catch (error) {
      logger.error('Failed to process event', {
        event: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
      if (event.type === 'receive') {
        this.deliver([
          { to: event.playerId, message: { type: 'error', message: 'Internal server error' } },
        ]);
      }
    }
  }

  private handleCreate(session: SessionHandle): void {
    const { state, player } = this.state.addPlayer(session);
    this.state = state;

    logger.info('Player joined', { playerId: player.id, playerCount: state.getPlayerCount() });

    session.publish({ type: 'connected', id: player.id });
  }

  private handleDelete(playerId: PlayerId): void {
    if (!this.state.getPlayer(playerId)) {
      logger.warn('Delete for unknown player', { playerId });
      return;
    }

    const outbound: Outbound[] = [];

    if (this.config.forfeitOnDisconnect) {
      const forfeited = this.state.forfeitMatchOf(playerId);
      if (forfeited) {
        this.state = forfeited.state;
        logger.info('Match forfeited on disconnect', {
          matchId: forfeited.match.id,
          playerId,
        });
        outbound.push(...roundResultsFor(forfeited.match).filter((o) => o.to !== playerId));
      }

      const { state, released } = this.state.releaseChallengersOf(playerId);
      this.state = state;
      for (const id of released) {
        outbound.push({ to: id, message: { type: 'phase_update', phase: IDLE } });
      }
    }

    this.state = this.state.removePlayer(playerId);
    logger.info('Player disconnected', {
      playerId,
      playerCount: this.state.getPlayerCount(),
    });

    this.deliver(outbound);
  }

  private handleReceive(playerId: PlayerId, text: string): void {
    if (!this.state.getPlayer(playerId)) {
      logger.warn('Message from unknown player', { playerId, rawData: text.substring(0, 100) });
      return;
    }

    const message = decodeClientMessage(text);
    if (!message) {
      logger.warn('Failed to parse message', { playerId, rawData: text.substring(0, 100) });
      this.deliver([errorFor(playerId, MESSAGE_UNDECODABLE)]);
      return;
    }

    const result = handleMessage(message, { playerId }, this.state);
    this.state = result.newState;
    this.deliver(result.outbound);
  }

  /**
   * Publish each message to the session of its addressee. Players that
   * have left are skipped.
   */
  private deliver(outbound: readonly Outbound[]): void {
    for (const { to, message } of outbound) {
      const player = this.state.getPlayer(to);
      if (!player) {
        logger.debug('Dropping message for departed player', { to, type: message.type });
        continue;
      }
      player.session.publish(message);
    }
  }

  // For testing
  getState(): World {
    return this.state;
  }
}
