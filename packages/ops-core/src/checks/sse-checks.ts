import { SSE_DATA_PREFIX, SSE_DONE_LINE } from '../constants';
import type { CheckResult } from './check-result';

export interface SseFraming extends CheckResult {
  dataLines: number;
  hasDone: boolean;
  /** First line that is neither blank nor an SSE comment starts with `data: ` */
  firstLineIsData: boolean;
}

/**
 * Framing of a text/event-stream body: at least one `data: ` line
 * and a terminating `data: [DONE]` line.
 */
export function checkSseFraming(body: string): SseFraming {
  const lines = body.split(/\r?\n/);
  const dataLines = lines.filter((line) => line.startsWith(SSE_DATA_PREFIX)).length;
  const hasDone = lines.some((line) => line === SSE_DONE_LINE);
  const first = lines.find((line) => line.trim() !== '' && !line.startsWith(':'));
  const firstLineIsData = first !== undefined && first.startsWith(SSE_DATA_PREFIX);

  if (dataLines === 0) {
    return { ok: false, detail: "Streaming output missing 'data:' lines (SSE broken)", dataLines, hasDone, firstLineIsData };
  }
  if (!hasDone) {
    return { ok: false, detail: 'Streaming output missing [DONE]', dataLines, hasDone, firstLineIsData };
  }
  return { ok: true, detail: `SSE streaming format OK (${dataLines} data lines)`, dataLines, hasDone, firstLineIsData };
}
