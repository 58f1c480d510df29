export interface SSEMessage {
  event?: string;
  data: string;
}

/**
 * Splits a `text/event-stream` body into messages. Multi-line `data:` fields
 * are joined with `\n`; comments and unknown fields are dropped.
 */
export async function* parseSSEStream(body: ReadableStream<Uint8Array>): AsyncIterable<SSEMessage> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';
  let event: string | undefined;
  let data: string[] = [];
  let drained = false;

  const dispatch = (): SSEMessage | undefined => {
    const message = data.length > 0 ? { event, data: data.join('\n') } : undefined;
    event = undefined;
    data = [];
    return message;
  };

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        drained = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const rawLine of lines) {
        const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
        if (line === '') {
          const message = dispatch();
          if (message) yield message;
          continue;
        }
        const field = readField(line);
        if (field?.name === 'event') event = field.value;
        if (field?.name === 'data') data.push(field.value);
      }
    }

    buffer += decoder.decode();
    if (buffer !== '') {
      const field = readField(buffer.endsWith('\r') ? buffer.slice(0, -1) : buffer);
      if (field?.name === 'event') event = field.value;
      if (field?.name === 'data') data.push(field.value);
    }
    const trailing = dispatch();
    if (trailing) yield trailing;
  } finally {
    // Consumer stopped early; release the underlying connection.
    if (!drained) await reader.cancel();
    reader.releaseLock();
  }
}

function readField(line: string): { name: string; value: string } | undefined {
  if (line.startsWith(':')) return undefined;
  const colon = line.indexOf(':');
  if (colon === -1) return { name: line, value: '' };
  const value = line.slice(colon + 1);
  return {
    name: line.slice(0, colon),
    value: value.startsWith(' ') ? value.slice(1) : value,
  };
}
