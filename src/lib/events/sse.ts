import { ReadableStream } from 'node:stream/web';
import { TextEncoder } from 'node:util';
import type { HubEvent } from '../types';
import type { Subscription } from './event-hub';

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  'Connection': 'keep-alive',
  'X-Accel-Buffering': 'no'
} as const;

export const HEARTBEAT_FRAME = ': heartbeat\n\n';

export function formatSseEvent(event: HubEvent): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}

/**
 * Serve a subscription as a `text/event-stream` body. Cancelling the stream
 * (client disconnect) closes the subscription.
 */
export function createEventStream(
  subscription: Subscription,
  options: { heartbeatMs?: number } = {}
): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const heartbeatMs = options.heartbeatMs ?? 30 * 1000;
  let heartbeat: ReturnType<typeof setInterval> | null = null;
  let cancelled = false;

  const stopHeartbeat = () => {
    if (heartbeat) {
      clearInterval(heartbeat);
      heartbeat = null;
    }
  };

  return new ReadableStream<Uint8Array>({
    start(controller) {
      // Keep proxies from closing an idle connection
      heartbeat = setInterval(() => {
        controller.enqueue(encoder.encode(HEARTBEAT_FRAME));
      }, heartbeatMs);
      heartbeat.unref();
    },

    async pull(controller) {
      const next = await subscription.next();
      if (cancelled) return;
      if (next.done) {
        stopHeartbeat();
        controller.close();
        return;
      }
      controller.enqueue(encoder.encode(formatSseEvent(next.value)));
    },

    cancel() {
      cancelled = true;
      stopHeartbeat();
      subscription.close();
    }
  });
}
