/**
 * Event-stream replies
 *
 * The gateway may answer a POST with `text/event-stream`. Each event's `data:`
 * lines are buffered until the terminating blank line and joined with '\n'
 * before being parsed as one JSON document.
 */

import { createParser, type EventSourceMessage } from 'eventsource-parser';
import { parseJsonPayload } from './wire.js';

/**
 * Decode an event-stream body into one JSON value per event.
 *
 * Events without data (keep-alives) are skipped. The underlying stream is
 * cancelled when the consumer stops iterating early.
 */
export async function* readEventStream(body: ReadableStream<Uint8Array>): AsyncGenerator<unknown> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const queue: EventSourceMessage[] = [];
  const parser = createParser({
    onEvent(event) {
      queue.push(event);
    },
  });

  let finished = false;
  try {
    while (!finished) {
      const { done, value } = await reader.read();
      if (done) {
        // flush a trailing event that was not followed by a blank line
        parser.feed(`${decoder.decode()}\n\n`);
        finished = true;
      } else {
        parser.feed(decoder.decode(value, { stream: true }));
      }

      while (queue.length > 0) {
        const event = queue.shift();
        if (!event || event.data.trim() === '') continue;
        yield parseJsonPayload(event.data, 'event stream');
      }
    }
  } finally {
    if (!finished) {
      await reader.cancel().catch((err: unknown) => {
        console.error('[streaming] Failed to cancel event stream:', err);
      });
    }
    reader.releaseLock();
  }
}
