/**
 * Literal fixtures the suites send and look for.
 * These strings are matched byte for byte against live responses.
 */

export const DEFAULT_GOLDEN_PHRASE = 'Projektleitung Konzepthase';
export const DEFAULT_GOLDEN_FILE = 'Sockelkosten Konzeptphase.xlsx';
export const DEFAULT_OPEN_PROBE_PATH = '/data/rag/1/Kalkulation/Sockelkosten Konzeptphase.xlsx';

export const ACK_PROMPT = 'Sag nur OK.';
export const ACK_MARKERS = ['"content":"OK"', '"content":"OK.'] as const;
export const REFUSAL_PHRASE = 'Nicht in den Dokumenten gefunden';
export const NO_EXACT_HITS_ANSWER = '0 exakte Treffer';

export const OPEN_URL_MARKER = '/open?path=';
export const LITERAL_SEARCH_TERM = 'Tabelle1';

export const SSE_DATA_PREFIX = 'data: ';
export const SSE_DONE_LINE = 'data: [DONE]';

export const AGENT_VECTOR_STORE_FILE = '/chroma/chroma.sqlite3';
export const AGENT_SERVICE = 'agent_api';

export const RELEASE_RAG_PROMPTS = [
  'Suche nach "Sockelkosten Konzeptphase" und nenne Datei + Pfad. Gib /open URLs als Quellen an.',
  'Suche nach "Projektleitung Konzepthase" und gib Ausschnitt + Quelle.',
  'Gib mir eine kurze Liste der 5 häufigsten Dateitypen, mit Quellenlinks.'
] as const;

/**
 * Golden-path prompt: exact phrase, answer with file names only
 */
export function exactPhrasePrompt(phrase: string): string {
  return `Suche exakt die Phrase: ${phrase}. Gib nur die Dateinamen der besten Treffer.`;
}

/**
 * Matrix prompt: exact phrase, free-form answer
 */
export function matrixPrompt(phrase: string): string {
  return `Suche exakt die Phrase: ${phrase}`;
}
