import Fastify, { type FastifyInstance } from 'fastify';
import { sleep } from '../../src/shared/timing.js';

export interface StubResponse {
  status?: number;
  body?: string | Record<string, unknown>;
  /** Held this long after the request is recorded. */
  delayMs?: number;
}

export interface RecordedRequest {
  method: string;
  path: string;
  headers: Record<string, string | string[] | undefined>;
  body: unknown;
}

/**
 * In-process HTTP stand-in for the sites and APIs the service talks to.
 * Routes answer with a fixed response, or walk through a sequence and
 * repeat its last entry. Unknown routes answer 404.
 */
export class StubServer {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, StubResponse[]>();

  private constructor(
    private readonly app: FastifyInstance,
    readonly baseUrl: string,
  ) {}

  static async start(): Promise<StubServer> {
    const app = Fastify({ logger: false });
    let server: StubServer | undefined;

    app.route({
      method: ['GET', 'POST'],
      url: '/*',
      handler: async (request, reply) => {
        const path = request.url.split('?')[0] ?? '/';
        server?.requests.push({
          method: request.method,
          path,
          headers: request.headers,
          body: request.body,
        });

        const response = server?.next(request.method, path) ?? { status: 404, body: 'not found' };
        if (response.delayMs !== undefined) {
          await sleep(response.delayMs);
        }
        const body = response.body ?? '';
        if (typeof body === 'string') {
          reply.type('text/html');
        }
        return reply.status(response.status ?? 200).send(body);
      },
    });

    const baseUrl = await app.listen({ host: '127.0.0.1', port: 0 });
    server = new StubServer(app, baseUrl);
    return server;
  }

  on(method: 'GET' | 'POST', path: string, ...responses: StubResponse[]): this {
    this.routes.set(`${method} ${path}`, responses);
    return this;
  }

  url(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  requestsTo(path: string): RecordedRequest[] {
    return this.requests.filter((r) => r.path === path);
  }

  async close(): Promise<void> {
    await this.app.close();
  }

  private next(method: string, path: string): StubResponse | undefined {
    const queue = this.routes.get(`${method} ${path}`);
    if (!queue || queue.length === 0) {
      return undefined;
    }
    return queue.length > 1 ? queue.shift() : queue[0];
  }
}

/** A base URL nothing listens on: requests fail with ECONNREFUSED. */
export async function unreachableBaseUrl(): Promise<string> {
  const app = Fastify({ logger: false });
  const address = await app.listen({ host: '127.0.0.1', port: 0 });
  await app.close();
  return address;
}
