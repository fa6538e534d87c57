import express, { type Request, type RequestHandler, type Response } from 'express';
import type { Server } from 'http';

/**
 * In-process HTTP stand-in for the stack's services.
 * Binds an ephemeral port on 127.0.0.1; unmatched routes answer 404.
 */

export type StubMethod = 'get' | 'post' | 'head' | 'put' | 'delete' | 'all';

export interface StubRoute {
  method: StubMethod;
  path: string;
  handler: (req: Request, res: Response) => void;
}

export interface RecordedCall {
  method: string;
  path: string;
  query: string;
  body: string;
}

export interface StubServer {
  url: string;
  calls: RecordedCall[];
  close(): Promise<void>;
}

export async function startStubServer(routes: StubRoute[]): Promise<StubServer> {
  const app = express();
  const calls: RecordedCall[] = [];

  app.use(express.text({ type: '*/*' }));

  const record: RequestHandler = (req, _res, next) => {
    const queryIndex = req.originalUrl.indexOf('?');
    calls.push({
      method: req.method,
      path: req.path,
      query: queryIndex === -1 ? '' : req.originalUrl.slice(queryIndex + 1),
      body: typeof req.body === 'string' ? req.body : ''
    });
    next();
  };
  app.use(record);

  for (const route of routes) {
    app.all(route.path, (req, res, next) => {
      const method = req.method.toLowerCase();
      const matches =
        route.method === 'all' || route.method === method || (route.method === 'get' && method === 'head');

      if (!matches) {
        next();
        return;
      }
      route.handler(req, res);
    });
  }

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Stub server is not bound to a TCP port');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    calls,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
}

/**
 * Answer with JSON (or raw text) and a status
 */
export function reply(status: number, body: unknown = ''): StubRoute['handler'] {
  return (_req, res) => {
    if (typeof body === 'string') {
      res.status(status).type('application/json').send(body);
    } else {
      res.status(status).json(body);
    }
  };
}

/**
 * Answer with statuses in order; the last one repeats
 */
export function replyInSequence(statuses: number[]): StubRoute['handler'] {
  let index = 0;

  return (_req, res) => {
    const status = statuses[Math.min(index, statuses.length - 1)];
    index++;
    res.status(status).send(status === 200 ? '{"ok":true}' : '');
  };
}

/**
 * Send an event-stream body line by line, optionally pausing between writes
 */
export function replyEventStream(lines: string[], delayMs = 0): StubRoute['handler'] {
  return (_req, res) => {
    res.status(200).setHeader('Content-Type', 'text/event-stream');
    res.flushHeaders();

    let index = 0;
    let closed = false;
    res.on('close', () => {
      closed = true;
    });

    const writeNext = () => {
      if (closed) return;
      if (index >= lines.length) {
        res.end();
        return;
      }
      res.write(`${lines[index]}\n`);
      index++;
      setTimeout(writeNext, delayMs);
    };
    writeNext();
  };
}
