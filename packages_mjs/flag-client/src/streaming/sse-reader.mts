/**
 * Server-Sent Events (SSE) parser
 */

/**
 * A parsed SSE event
 */
export interface SSEEvent {
  data: string;
  event?: string;
  id?: string;
  retry?: number;
}

/**
 * Incremental SSE parser fed with raw body chunks
 */
export class SSEParser {
  private readonly decoder = new TextDecoder();
  private buffer = '';

  /**
   * Add a chunk and return the events it completed
   */
  push(chunk: Uint8Array): SSEEvent[] {
    this.buffer += this.decoder.decode(chunk, { stream: true }).replace(/\r\n?/g, '\n');

    // Split on double newlines (SSE event delimiter)
    const parts = this.buffer.split('\n\n');

    // Keep the last part in buffer (may be incomplete)
    this.buffer = parts.pop() ?? '';

    const events: SSEEvent[] = [];
    for (const part of parts) {
      const event = parseSSEEvent(part);
      if (event) {
        events.push(event);
      }
    }
    return events;
  }

  /**
   * Parse whatever is left once the stream has ended
   */
  flush(): SSEEvent[] {
    const rest = this.buffer + this.decoder.decode();
    this.buffer = '';
    if (!rest.trim()) return [];
    const event = parseSSEEvent(rest);
    return event ? [event] : [];
  }
}

/**
 * Parse a single SSE event from text
 *
 * @returns the event, or null when it carries neither data nor a type
 */
export function parseSSEEvent(text: string): SSEEvent | null {
  const lines = text.split('\n');
  const event: SSEEvent = { data: '' };
  const dataLines: string[] = [];

  for (const line of lines) {
    if (line.startsWith(':')) {
      // Comment line, ignore
      continue;
    }

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) {
      continue;
    }

    const field = line.slice(0, colonIndex);
    // Value starts after colon, strip leading space if present
    let value = line.slice(colonIndex + 1);
    if (value.startsWith(' ')) {
      value = value.slice(1);
    }

    switch (field) {
      case 'event':
        event.event = value;
        break;
      case 'id':
        event.id = value;
        break;
      case 'retry': {
        const retry = parseInt(value, 10);
        if (Number.isFinite(retry)) event.retry = retry;
        break;
      }
      case 'data':
        dataLines.push(value);
        break;
    }
  }

  event.data = dataLines.join('\n');

  if (!event.data && !event.event) {
    return null;
  }

  return event;
}
