import { EventEmitter } from 'node:events';
import { EventEnvelope } from './event-types.js';

type Listener<T> = (event: T) => void;

type EventOf<TEvent extends EventEnvelope, TType extends TEvent['type']> = Extract<TEvent, { type: TType }>;

export class EventBus<TEvent extends EventEnvelope> {
  private readonly emitter = new EventEmitter();
  private seq = 0;

  publish<TType extends TEvent['type']>(
    type: TType,
    data: EventOf<TEvent, TType>['data'],
  ): EventOf<TEvent, TType> {
    const event = {
      seq: ++this.seq,
      ts: new Date().toISOString(),
      type,
      data,
    } as unknown as EventOf<TEvent, TType>;

    this.emitter.emit('event', event);
    return event;
  }

  onAny(listener: Listener<TEvent>): () => void {
    this.emitter.on('event', listener);
    return () => this.emitter.off('event', listener);
  }

  subscriberCount(): number {
    return this.emitter.listenerCount('event');
  }

  /** Continue numbering after events already on disk. */
  resumeFrom(seq: number): void {
    this.seq = Math.max(this.seq, seq);
  }
}
