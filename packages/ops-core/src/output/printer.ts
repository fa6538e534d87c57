/**
 * Human-readable transcript lines for operators
 */
export interface Printer {
  line(text?: string): void;
  heading(title: string): void;
  rule(): void;
  ok(text: string): void;
  fail(text: string): void;
  warn(text: string): void;
}

export type WriteFn = (text: string) => void;

const RULE = '='.repeat(42);

export function createPrinter(write: WriteFn = (text) => process.stdout.write(text)): Printer {
  const line = (text = '') => write(`${text}\n`);

  return {
    line,
    heading: (title) => line(`=== ${title} ===`),
    rule: () => line(RULE),
    ok: (text) => line(`✅ ${text}`),
    fail: (text) => line(`❌ ${text}`),
    warn: (text) => line(`⚠️  ${text}`)
  };
}
