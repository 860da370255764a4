import { EventEmitter } from 'events';
import type { BoardEvent, BoardEventName } from '@oracle-bridge/sdk';
import { execute, query } from '../db/index.js';
import { logger } from '../logger.js';

const log = logger.child({ component: 'events' });

export type EventOf<N extends BoardEventName> = Extract<BoardEvent, { name: N }>;

export interface StoredEvent {
  id: number;
  name: BoardEventName;
  requestId: number | null;
  payload: unknown;
  blockNumber: number;
}

interface EventRow {
  [key: string]: unknown;
  id: number;
  name: BoardEventName;
  request_id: number | null;
  payload: string;
  block_number: number;
}

function toJson(event: BoardEvent): string {
  return JSON.stringify(event, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

/**
 * Board event log
 *
 * Events are written with the transaction that raised them and handed to
 * subscribers only once that transaction has committed.
 */
export class EventLog {
  private readonly emitter = new EventEmitter();
  private pending: BoardEvent[] = [];

  record(event: BoardEvent, blockNumber: number): void {
    execute(
      `INSERT INTO board_events (name, request_id, payload, block_number, created_at)
       VALUES (?, ?, ?, ?, ?)`,
      [event.name, 'id' in event ? event.id : null, toJson(event), blockNumber, Date.now()]
    );
    this.pending.push(event);
  }

  /**
   * Publish events recorded since the last flush
   */
  flush(): void {
    const events = this.pending;
    this.pending = [];

    for (const event of events) {
      try {
        this.emitter.emit(event.name, event);
      } catch (error) {
        log.error({ err: error, event: event.name }, 'event subscriber failed');
      }
    }
  }

  discard(): void {
    this.pending = [];
  }

  on<N extends BoardEventName>(name: N, listener: (event: EventOf<N>) => void): () => void {
    this.emitter.on(name, listener);
    return () => {
      this.emitter.off(name, listener);
    };
  }

  list(requestId?: number): StoredEvent[] {
    const rows = requestId === undefined
      ? query<EventRow>('SELECT * FROM board_events ORDER BY id ASC')
      : query<EventRow>('SELECT * FROM board_events WHERE request_id = ? ORDER BY id ASC', [requestId]);

    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      requestId: row.request_id,
      payload: JSON.parse(row.payload),
      blockNumber: row.block_number,
    }));
  }
}
