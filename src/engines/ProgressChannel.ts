/**
 * Canal de progreso: ProgressSink que se consume con `for await`.
 *
 * report() nunca bloquea: los eventos se encolan sin límite hasta que el consumidor los lee,
 * de modo que la transferencia no depende del ritmo del consumidor. close() termina la
 * iteración una vez vaciada la cola; reportar después de cerrar se descarta.
 *
 * ProgressAggregator lleva el total acumulado (suma conmutativa de incrementos) y reenvía
 * los eventos a otro sink opcional.
 *
 * @module ProgressChannel
 */

import { createScopedLogger } from '../utils/logger';
import type { ProgressEvent, ProgressSink } from './types';

const log = createScopedLogger('ProgressChannel');

export class ProgressChannel implements ProgressSink, AsyncIterable<ProgressEvent> {
  private readonly queue: ProgressEvent[] = [];
  private readonly waiters: Array<(_result: IteratorResult<ProgressEvent>) => void> = [];
  private closed = false;
  private dropped = 0;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Eventos reportados después de close() (descartados). */
  get droppedCount(): number {
    return this.dropped;
  }

  report(event: ProgressEvent): void {
    if (this.closed) {
      this.dropped++;
      log.debug('Evento de progreso descartado: el canal ya está cerrado');
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
    } else {
      this.queue.push(event);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  private next(): Promise<IteratorResult<ProgressEvent>> {
    const event = this.queue.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
    return { next: () => this.next() };
  }
}

export interface ProgressSnapshot {
  total: number;
  written: number;
  /** Parte de `written` que ya estaba en disco al empezar. */
  resumed: number;
  events: number;
}

export class ProgressAggregator implements ProgressSink {
  private snapshot: ProgressSnapshot = { total: -1, written: 0, resumed: 0, events: 0 };

  constructor(
    private readonly forward: ProgressSink | null = null,
    private readonly onUpdate: ((_snapshot: Readonly<ProgressSnapshot>) => void) | null = null
  ) {}

  report(event: ProgressEvent): void {
    this.snapshot = {
      total: event.total,
      written: this.snapshot.written + event.writtenBytes,
      resumed: this.snapshot.resumed + (event.fromDisk ? event.writtenBytes : 0),
      events: this.snapshot.events + 1,
    };
    this.onUpdate?.(this.snapshot);
    this.forward?.report(event);
  }

  close(): void {
    this.forward?.close();
  }

  get current(): Readonly<ProgressSnapshot> {
    return this.snapshot;
  }

  /** Fracción completada en [0, 1], o null si el total es desconocido. */
  get ratio(): number | null {
    const { total, written } = this.snapshot;
    if (total < 0) return null;
    if (total === 0) return 1;
    return Math.min(written / total, 1);
  }
}

/** Consume un canal hasta que se cierra y devuelve los eventos recibidos. */
export async function drainProgress(source: AsyncIterable<ProgressEvent>): Promise<ProgressEvent[]> {
  const events: ProgressEvent[] = [];
  for await (const event of source) {
    events.push(event);
  }
  return events;
}
