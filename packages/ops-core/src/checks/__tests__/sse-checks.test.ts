import { describe, it, expect } from 'vitest';
import { buildSseLines } from '@ragops/test-utils';
import { checkSseFraming } from '../sse-checks';

describe('checkSseFraming', () => {
  it('should accept data lines terminated by [DONE]', () => {
    const result = checkSseFraming(buildSseLines(['O', 'K']).join('\n'));

    expect(result).toEqual({
      ok: true,
      detail: 'SSE streaming format OK (3 data lines)',
      dataLines: 3,
      hasDone: true,
      firstLineIsData: true
    });
  });

  it('should reject a stream without [DONE]', () => {
    const result = checkSseFraming(buildSseLines(['OK'], { done: false }).join('\n'));

    expect(result.ok).toBe(false);
    expect(result.detail).toBe('Streaming output missing [DONE]');
  });

  it('should reject a body without data lines', () => {
    const result = checkSseFraming('event: ping\n\n');

    expect(result.ok).toBe(false);
    expect(result.detail).toBe("Streaming output missing 'data:' lines (SSE broken)");
  });

  it('should require the space after data:', () => {
    expect(checkSseFraming('data:[DONE]\n').ok).toBe(false);
  });

  it('should require the sentinel line to match exactly', () => {
    const result = checkSseFraming('data: {"x":1}\ndata: [DONE] \n');

    expect(result.ok).toBe(false);
    expect(result.hasDone).toBe(false);
  });

  it('should handle CRLF line endings', () => {
    expect(checkSseFraming('data: {"x":1}\r\n\r\ndata: [DONE]\r\n').ok).toBe(true);
  });

  it('should skip comments when looking at the first line', () => {
    expect(checkSseFraming(': keepalive\n\ndata: x\ndata: [DONE]\n').firstLineIsData).toBe(true);

    const named = checkSseFraming('event: message\ndata: x\ndata: [DONE]\n');
    expect(named.ok).toBe(true);
    expect(named.firstLineIsData).toBe(false);
  });
});
