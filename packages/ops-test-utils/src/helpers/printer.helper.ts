import { createPrinter, type Printer } from '@ragops/core';

/**
 * Printer that keeps every line in memory
 */
export function capturePrinter(): { printer: Printer; lines: string[] } {
  const lines: string[] = [];
  const printer = createPrinter((text) => {
    lines.push(...text.replace(/\n$/, '').split('\n'));
  });

  return { printer, lines };
}
