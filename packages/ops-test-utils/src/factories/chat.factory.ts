/**
 * Canned agent responses
 */

export function buildChatCompletion(content: string | null, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    id: 'chatcmpl-test',
    object: 'chat.completion',
    model: 'llama4:latest',
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content },
        finish_reason: 'stop'
      }
    ],
    ...extra
  });
}

export function buildStreamChunk(content: string): string {
  return `data: ${JSON.stringify({ choices: [{ index: 0, delta: { content } }] })}`;
}

/**
 * Lines of an event-stream answer (blank separators included)
 */
export function buildSseLines(tokens: string[], options: { done?: boolean } = {}): string[] {
  const lines: string[] = [];

  for (const token of tokens) {
    lines.push(buildStreamChunk(token), '');
  }
  if (options.done !== false) {
    lines.push('data: [DONE]', '');
  }

  return lines;
}
