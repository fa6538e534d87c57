import {
  buildChatCompletion,
  buildClusterHealth,
  buildCount,
  buildSearchResponse,
  buildSseLines,
  reply,
  replyEventStream,
  startStubServer,
  type StubServer
} from '@ragops/test-utils';

export const GOLDEN_FILE = 'Sockelkosten Konzeptphase.xlsx';
export const OPEN_PROBE_PATH = '/data/rag/1/Kalkulation/Sockelkosten Konzeptphase.xlsx';

const INDEXED_PHRASES = ['Projektleitung Konzepthase', 'Engineering Konzeptphase', 'Tabelle1', 'SBB TFK', 'Gotthard'];

/**
 * A healthy stack in miniature: search index, agent, and one server for the LLM and web UI
 */
export interface ProbeStubs {
  es: StubServer;
  agent: StubServer;
  misc: StubServer;
  state: { agentAlwaysHits: boolean; docCount: number };
  env(extra?: Record<string, string>): Record<string, string>;
  close(): Promise<void>;
}

function bodyText(body: unknown): string {
  return typeof body === 'string' ? body : '';
}

export async function startProbeStubs(): Promise<ProbeStubs> {
  const state = { agentAlwaysHits: false, docCount: 1500 };

  const es = await startStubServer([
    { method: 'get', path: '/', handler: reply(200, { tagline: 'You Know, for Search' }) },
    { method: 'get', path: '/_cluster/health', handler: reply(200, buildClusterHealth('green')) },
    { method: 'get', path: '/_cluster/health/rag_files_v1', handler: reply(200, buildClusterHealth('yellow')) },
    { method: 'get', path: '/rag_files_v1/_count', handler: (req, res) => reply(200, buildCount(state.docCount))(req, res) },
    {
      method: 'post',
      path: '/rag_files_v1/_search',
      handler: (req, res) => {
        const text = bodyText(req.body);

        if (text.includes('"aggs"')) {
          reply(200, buildSearchResponse([], {
            total: 15,
            aggregations: {
              ext: { buckets: [{ key: 'pdf', doc_count: 10 }, { key: 'xlsx', doc_count: 5 }] },
              mime: { buckets: [{ key: 'application/pdf', doc_count: 10 }] }
            }
          }))(req, res);
        } else if (text.includes('"match_all"')) {
          reply(200, buildSearchResponse([
            { filename: 'a.pdf', content: 'Inhalt' },
            { filename: 'b.xlsx', content: 'Tabelle1' },
            { filename: 'leer.pdf', content: '  ' },
            { filename: 'c.docx', content: 'Text' }
          ]))(req, res);
        } else if (text.includes('"match_phrase"')) {
          const indexed = INDEXED_PHRASES.some((phrase) => text.includes(JSON.stringify(phrase)));
          reply(200, buildSearchResponse(indexed ? [{ filename: GOLDEN_FILE, real: OPEN_PROBE_PATH }] : []))(req, res);
        } else {
          reply(200, buildSearchResponse([], { total: 42 }))(req, res);
        }
      }
    }
  ]);

  const agent = await startStubServer([
    { method: 'get', path: '/health', handler: reply(200, { ok: true }) },
    { method: 'get', path: '/v1/models', handler: reply(200, { data: [{ id: 'llama4:latest' }] }) },
    { method: 'get', path: '/openapi.json', handler: reply(200, { openapi: '3.1.0' }) },
    {
      method: 'get',
      path: '/open',
      handler: (req, res) => reply(req.query.path === OPEN_PROBE_PATH ? 200 : 404, '')(req, res)
    },
    {
      method: 'post',
      path: '/v1/chat/completions',
      handler: (req, res) => {
        const text = bodyText(req.body);

        if (text.includes('"stream":true')) {
          replyEventStream(buildSseLines(['O', 'K']))(req, res);
        } else if (text.includes('Sag nur OK.')) {
          reply(200, buildChatCompletion('OK'))(req, res);
        } else if (text.includes('Gib nur die Dateinamen')) {
          reply(200, buildChatCompletion(GOLDEN_FILE, {
            sources: [{ url: `/open?path=${encodeURIComponent(OPEN_PROBE_PATH)}` }]
          }))(req, res);
        } else if (text.includes('Suche exakt die Phrase: ')) {
          const indexed = state.agentAlwaysHits || INDEXED_PHRASES.some((phrase) => text.includes(`Phrase: ${phrase}"`));
          reply(200, buildChatCompletion(indexed ? `Treffer in ${GOLDEN_FILE}` : '0 exakte Treffer'))(req, res);
        } else {
          reply(200, buildChatCompletion('Antwort mit Quellen'))(req, res);
        }
      }
    }
  ]);

  const misc = await startStubServer([
    { method: 'get', path: '/api/tags', handler: reply(200, { models: [{ name: 'llama4:latest' }] }) },
    { method: 'get', path: '/', handler: reply(200, '<html></html>') }
  ]);

  return {
    es,
    agent,
    misc,
    state,
    env: (extra = {}) => ({
      LOG_LEVEL: 'silent',
      ES_URL: es.url,
      AGENT_URL: agent.url,
      OLLAMA_URL: misc.url,
      WEBUI_URL: misc.url,
      OPEN_PROBE_PATH,
      ...extra
    }),
    close: async () => {
      await es.close();
      await agent.close();
      await misc.close();
    }
  };
}
