/**
 * StreamLens Stream Gateway
 *
 * Accepts live camera/microphone streams over WebSocket and serves the clips
 * and memories they produce over HTTP.
 *
 * Endpoints:
 * - WS  /ws/video-caption (one session per connection)
 * - GET /sessions/:sessionId/clips?start=&end=
 * - GET /sessions/:sessionId/clips/at?time=
 * - GET /memories/search?q=&limit=
 * - GET /health
 * - GET /ready
 * - GET /stats
 */

import Fastify from 'fastify';
import { WebSocketServer } from 'ws';
import { loadConfig, describeError, DEFAULT_MEMORY_SEARCH_LIMIT } from '@streamlens/domain';
import { GatewayService } from './service.js';
import { createAdapters, initializeAdapters } from './adapters.js';
import { WsWireConnection } from './wire.js';

function parseTime(value: string | undefined): Date | null {
  if (!value) return null;
  const time = new Date(value);
  return Number.isNaN(time.getTime()) ? null : time;
}

async function main() {
  console.log('[Gateway] Starting StreamLens Stream Gateway...');

  const config = loadConfig();
  const adapters = createAdapters(config);
  await initializeAdapters(adapters, config);

  const service = new GatewayService(adapters, {
    bucket: config.storage.bucket,
    userScope: config.memory.userScope,
    pipeline: config.pipeline,
    presignTtlSeconds: config.storage.presignTtlSeconds,
  });
  await service.initialize();

  const server = Fastify({ logger: true });

  // Health check
  server.get('/health', async (_request, reply) => {
    const report = await service.healthCheck();
    if (!report.healthy) {
      reply.code(503);
    }
    return { status: report.healthy ? 'healthy' : 'unhealthy', checks: report.checks };
  });

  // Ready check
  server.get('/ready', async () => {
    return { status: 'ready' };
  });

  server.get('/stats', async () => {
    return service.getStats();
  });

  server.get<{
    Params: { sessionId: string };
    Querystring: { start?: string; end?: string };
  }>('/sessions/:sessionId/clips', async (request, reply) => {
    const { sessionId } = request.params;
    const { start, end } = request.query;

    let range: { start: Date; end: Date } | undefined;
    if (start || end) {
      const from = parseTime(start);
      const to = parseTime(end);
      if (!from || !to) {
        reply.code(400);
        return { error: 'Both "start" and "end" must be ISO-8601 timestamps' };
      }
      range = { start: from, end: to };
    }

    try {
      const clips = await service.getSessionClips(sessionId, range);
      return { session_id: sessionId, total: clips.length, clips };
    } catch (error) {
      request.log.error(error, 'Clip query failed');
      reply.code(500);
      return { error: 'Clip query failed' };
    }
  });

  server.get<{
    Params: { sessionId: string };
    Querystring: { time?: string };
  }>('/sessions/:sessionId/clips/at', async (request, reply) => {
    const { sessionId } = request.params;
    const time = parseTime(request.query.time);
    if (!time) {
      reply.code(400);
      return { error: 'Query parameter "time" must be an ISO-8601 timestamp' };
    }

    try {
      const clip = await service.getClipAtTime(sessionId, time);
      if (!clip) {
        reply.code(404);
        return { error: 'No clip covers that time' };
      }
      return clip;
    } catch (error) {
      request.log.error(error, 'Clip lookup failed');
      reply.code(500);
      return { error: 'Clip lookup failed' };
    }
  });

  server.get<{
    Querystring: { q?: string; limit?: string };
  }>('/memories/search', async (request, reply) => {
    const { q, limit } = request.query;

    if (!q || q.trim().length === 0) {
      reply.code(400);
      return { error: 'Query parameter "q" is required' };
    }

    const limitNum = Math.min(parseInt(limit ?? '', 10) || DEFAULT_MEMORY_SEARCH_LIMIT, 100);

    try {
      const results = await service.searchMemories(q.trim(), limitNum);
      return { query: q, total: results.length, results };
    } catch (error) {
      request.log.error(error, 'Memory search failed');
      reply.code(500);
      return { error: 'Memory search failed' };
    }
  });

  const { host, port, wsPath } = config.server;
  const wss = new WebSocketServer({ server: server.server, path: wsPath });
  wss.on('connection', (socket) => {
    service.handleConnection(new WsWireConnection(socket));
  });
  wss.on('error', (error) => {
    console.error('[Gateway] WebSocket server error:', error.message);
  });

  await server.listen({ port, host });
  console.log(`[Gateway] Server listening on ${host}:${port} (ws path ${wsPath})`);

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('[Gateway] Shutting down...');
    await service.close();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await server.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error('[Gateway] Shutdown failed:', describeError(error));
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((error) => {
  console.error('[Gateway] Fatal error:', error);
  process.exit(1);
});
