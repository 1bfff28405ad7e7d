import { randomUUID } from 'crypto';
import { Router } from 'express';
import type { Container } from '../container.js';
import type { Observer, RealtimeEvent } from '../types/index.js';
import { requireSession } from './middleware.js';

export interface EventSink {
  write(chunk: string): boolean;
  readonly writableEnded: boolean;
}

// One dashboard tab listening over server-sent events
export class SseObserver implements Observer {
  constructor(
    readonly id: string,
    private readonly sink: EventSink,
  ) {}

  send(event: RealtimeEvent): void {
    if (this.sink.writableEnded) throw new Error('event stream closed');
    this.sink.write(`data: ${JSON.stringify(event)}\n\n`);
  }
}

export function eventsApi(container: Container): Router {
  const { notifier, auth } = container;
  const router = Router();

  router.get('/api/events', requireSession(auth), (req, res) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache, no-transform',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    res.write(`data: ${JSON.stringify({ type: 'connected', payload: { observers: notifier.observerCount + 1 } })}\n\n`);

    const unsubscribe = notifier.subscribe(new SseObserver(randomUUID(), res));
    req.on('close', unsubscribe);
  });

  return router;
}
