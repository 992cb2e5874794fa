/**
 * @fileoverview Tests for the testing utilities themselves.
 */

import { describe, expect, it } from 'vitest';
import { createMockConnection, createRecordingSession } from '../src/index.js';

describe('createMockConnection', () => {
  it('should start in OPEN state', () => {
    const conn = createMockConnection();
    expect(conn.readyState).toBe(1);
    expect(conn.OPEN).toBe(1);
    expect(conn.isClosed).toBe(false);
  });

  it('should store sent frames', () => {
    const conn = createMockConnection();
    conn.send('{"type":"connected","id":1}');
    conn.send('{"type":"challenge_accepted"}');

    expect(conn.sentMessages).toHaveLength(2);
    expect(conn.sentMessages[0]).toBe('{"type":"connected","id":1}');
  });

  it('should decode frames as server messages', () => {
    const conn = createMockConnection();
    conn.send('{"type":"direct","from":2,"text":"hi"}');

    expect(conn.getSentMessages()).toEqual([{ type: 'direct', from: 2, text: 'hi' }]);
  });

  it('should throw when a frame is not a server message', () => {
    const conn = createMockConnection();
    conn.send('{"type":"welcome"}');

    expect(() => conn.getSentMessages()).toThrow('Not a server message: {"type":"welcome"}');
  });

  it('should get last message', () => {
    const conn = createMockConnection();
    conn.send('{"type":"connected","id":1}');
    conn.send('{"type":"error","message":"nope"}');

    expect(conn.getLastMessage()).toEqual({ type: 'error', message: 'nope' });
  });

  it('should return undefined for last message when empty', () => {
    const conn = createMockConnection();
    expect(conn.getLastMessage()).toBeUndefined();
  });

  it('should filter messages by type', () => {
    const conn = createMockConnection();
    conn.send('{"type":"connected","id":1}');
    conn.send('{"type":"challenge","from":3}');
    conn.send('{"type":"challenge","from":4}');

    const challenges = conn.getMessagesOfType('challenge');
    expect(challenges.map((m) => m.from)).toEqual([3, 4]);
  });

  it('should close connection', () => {
    const conn = createMockConnection();
    conn.close();

    expect(conn.readyState).toBe(3);
    expect(conn.isClosed).toBe(true);
  });

  it('should not store frames after close', () => {
    const conn = createMockConnection();
    conn.close();
    conn.send('{"type":"challenge_accepted"}');

    expect(conn.sentMessages).toHaveLength(0);
  });

  it('should clear sent messages', () => {
    const conn = createMockConnection();
    conn.send('{"type":"challenge_accepted"}');
    conn.clearSentMessages();

    expect(conn.sentMessages).toHaveLength(0);
  });
});

describe('createRecordingSession', () => {
  it('should record published messages in order', () => {
    const session = createRecordingSession();
    session.publish({ type: 'challenge', from: 2 });
    session.publish({ type: 'challenge_accepted' });

    expect(session.messages).toEqual([{ type: 'challenge', from: 2 }, { type: 'challenge_accepted' }]);
  });

  it('should remember the id from the connected message', () => {
    const session = createRecordingSession();
    expect(session.playerId).toBeNull();

    session.publish({ type: 'connected', id: 7 });
    expect(session.playerId).toBe(7);
  });

  it('should clear recorded messages but keep the id', () => {
    const session = createRecordingSession();
    session.publish({ type: 'connected', id: 7 });
    session.clear();

    expect(session.messages).toHaveLength(0);
    expect(session.playerId).toBe(7);
  });
});
