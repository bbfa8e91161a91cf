/**
 * Application Entry Point
 *
 * A small demo app showing the boot sequence: configuration, middleware,
 * routes, error handlers, then the server.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import {
  Application,
  EventStream,
  HttpError,
  ServerEvent,
  html,
  loggingMiddleware,
  securityHeaders,
  text,
} from './framework/mod.ts';

async function* ticks(count: number): AsyncGenerator<ServerEvent | Record<string, unknown>> {
  for (let i = 1; i <= count; i++) {
    await sleep(1000);
    yield i === count ? new ServerEvent({ data: 'done', event: 'end' }) : { tick: i };
  }
}

async function main(): Promise<void> {
  // 1. Configuration from ./config/app.json and the environment
  const app = await Application.fromConfig();

  // 2. Global middleware, outermost first
  app.use(loggingMiddleware({ logger: app.getLogger() }));
  app.use(securityHeaders());

  // 3. Routes
  app.get('/', () => html`<h1>Hello</h1><p>Try <a href="/users/42">/users/42</a></p>`, 'home');
  app.get('/users/{id:int}', (_req, { id }) => ({ id, profile: `/users/${id}` }), 'user');
  app.post('/echo', async (req) => ({ received: await req.json() }));
  app.get('/teapot', () => {
    throw new HttpError(418, "I'm a teapot");
  });
  app.get('/ticks', () => new EventStream(ticks(5), { eventType: 'tick' }));

  // 4. Error handlers
  app.error(404, (req) => text(`Nothing at ${req.path}`, 404));

  // 5. Serve until SIGINT/SIGTERM
  app.getLifecycle().installSignalHandlers(() => app.stop());
  await app.listen();
}

main().catch((error: unknown) => {
  console.error('Failed to start:', error);
  process.exitCode = 1;
});
