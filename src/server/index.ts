import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { streamSSE, type SSEStreamingApi } from 'hono/streaming';
import checkDiskSpace from 'check-disk-space';
import { parse } from 'path';
import { homedir } from 'os';
import type { CleaningEvent, Logger, RunSummary } from '../types.js';
import type { CleaningEngine } from '../engine/cleaning-engine.js';
import { EngineBusyError, errorMessage } from '../utils/errors.js';

export interface ServerOptions {
  logger?: Logger;
  /** Drive whose free space /api/disk-info reports. Defaults to the home directory's drive. */
  diskPath?: string;
  keepAliveMs?: number;
}

export interface DashboardApp {
  app: Hono;
  /** Settles once the run started by the last POST /api/clean has finished. */
  idle(): Promise<void>;
}

export function createApp(engine: CleaningEngine, options: ServerOptions = {}): DashboardApp {
  const app = new Hono();
  const logger = options.logger ?? console;
  const diskPath = options.diskPath ?? parse(homedir()).root;
  const keepAliveMs = options.keepAliveMs ?? 15_000;

  const clients = new Set<SSEStreamingApi>();
  let lastSummary: RunSummary | null = null;
  let currentRun: Promise<void> = Promise.resolve();

  function broadcast(event: CleaningEvent): void {
    const data = JSON.stringify(event);
    for (const client of clients) {
      client.writeSSE({ event: event.type, data }).catch((error: unknown) => {
        logger.warn('[Server] Dropping SSE client:', errorMessage(error));
        clients.delete(client);
      });
    }
  }

  app.get('/api/tasks', (c) => {
    return c.json(
      engine.tasks.map((task) => ({
        name: task.name,
        category: task.category.id,
        group: task.category.group,
        scope: task.category.scope,
        enabled: task.enabled,
      }))
    );
  });

  app.get('/api/disk-info', async (c) => {
    try {
      const space = await checkDiskSpace(diskPath);
      return c.json({
        total: space.size,
        free: space.free,
        used: space.size - space.free,
      });
    } catch (error) {
      return c.json({ error: errorMessage(error) }, 500);
    }
  });

  app.get('/api/clean/events', (c) => {
    return streamSSE(c, async (stream) => {
      logger.log('[Server] SSE connected');
      clients.add(stream);
      stream.onAbort(() => {
        clients.delete(stream);
      });

      await stream.writeSSE({ event: 'connected', data: JSON.stringify({ running: engine.isRunning }) });

      while (!stream.aborted) {
        await stream.sleep(keepAliveMs);
        if (!stream.aborted) {
          await stream.writeSSE({ event: 'ping', data: '{}' });
        }
      }
      clients.delete(stream);
    });
  });

  app.post('/api/clean', (c) => {
    let run: Promise<RunSummary>;
    try {
      run = engine.run(broadcast);
    } catch (error) {
      if (error instanceof EngineBusyError) {
        return c.json({ error: 'busy', message: error.message }, 409);
      }
      throw error;
    }

    currentRun = run.then(
      (summary) => {
        lastSummary = summary;
      },
      (error: unknown) => {
        logger.error('[Server] Run failed:', error);
      }
    );

    return c.json({ success: true, message: 'Cleaning started' }, 202);
  });

  app.post('/api/clean/cancel', (c) => {
    return c.json({ cancelled: engine.cancel() });
  });

  app.get('/api/clean/last', (c) => {
    if (!lastSummary) {
      return c.json({ error: 'No run has completed yet' }, 404);
    }
    return c.json(lastSummary);
  });

  app.onError((error, c) => {
    logger.error('[Server] Request failed:', error);
    return c.json({ error: errorMessage(error) }, 500);
  });

  return { app, idle: () => currentRun };
}

export function startServer(engine: CleaningEngine, port = 3000): string {
  const { app } = createApp(engine);
  console.log(`Starting dashboard API on http://localhost:${port}`);
  serve({
    fetch: app.fetch,
    port,
  });
  return `http://localhost:${port}`;
}
