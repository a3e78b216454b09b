import { createServer, type IncomingMessage } from 'http';
import { URL } from 'url';

export interface RecordedRequest {
  method: string;
  path: string;
  headers: IncomingMessage['headers'];
  body: Buffer;
}

export interface MockServerOptions {
  transcriptText?: string;
  completionText?: string | null;
  /** Forces every request to fail with this status and an API error body. */
  failStatus?: number;
  errorMessage?: string;
  /** Sends a body that is not JSON. */
  malformed?: boolean;
}

export const startMockOpenAiServer = async (options: MockServerOptions = {}) => {
  const requests: RecordedRequest[] = [];

  const server = createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    let body = Buffer.alloc(0);
    req.on('data', (chunk: Buffer) => {
      body = Buffer.concat([body, chunk]);
    });
    req.on('end', () => {
      requests.push({ method: req.method ?? 'GET', path: url.pathname, headers: req.headers, body });
      res.setHeader('Content-Type', 'application/json');

      if (options.failStatus) {
        res.statusCode = options.failStatus;
        res.end(
          JSON.stringify({ error: { message: options.errorMessage ?? 'mock failure' } })
        );
        return;
      }
      if (options.malformed) {
        res.end('not json');
        return;
      }
      if (url.pathname === '/v1/audio/transcriptions' && req.method === 'POST') {
        res.end(JSON.stringify({ text: options.transcriptText ?? 'Hello from mock' }));
        return;
      }
      if (url.pathname === '/v1/chat/completions' && req.method === 'POST') {
        const content = options.completionText === undefined ? 'Mock completion' : options.completionText;
        res.end(JSON.stringify({ choices: [{ message: { role: 'assistant', content } }] }));
        return;
      }
      res.statusCode = 404;
      res.end(JSON.stringify({ error: { message: 'not found' } }));
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Unable to start mock server');
  }
  const baseUrl = `http://127.0.0.1:${address.port}/v1`;

  const close = async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  return { baseUrl, requests, close };
};
