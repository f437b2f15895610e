import express, { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import cors from 'cors';
import { randomUUID } from 'crypto';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { Logger } from './logger.js';
import { toolRegistry } from './mcp-tools.js';
import { getPackageMetadata } from './utils.js';

export type McpServerFactory = () => McpServer;

interface McpSession {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Live MCP sessions. An McpServer only ever serves one transport, so every
 * session gets its own server from the factory, and both go when the
 * session closes.
 */
export class McpSessionRegistry {
  private sessions = new Map<string, McpSession>();
  private logger = new Logger('MCP HTTP');

  constructor(private readonly createServer: McpServerFactory) {}

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: string): McpSession | undefined {
    return this.sessions.get(sessionId);
  }

  /** A server and transport pair; registered once its initialize succeeds. */
  async open(): Promise<McpSession> {
    const server = this.createServer();
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      enableJsonResponse: true,
      onsessioninitialized: sessionId => {
        this.sessions.set(sessionId, { transport, server });
        this.logger.debug(`Session ${sessionId} opened (${this.sessions.size} live)`);
      }
    });
    transport.onclose = () => this.forget(transport);

    await server.connect(transport);
    return { transport, server };
  }

  /** False when no such session exists. */
  async close(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }
    this.sessions.delete(sessionId);
    await session.server.close();
    this.logger.debug(`Session ${sessionId} closed`);
    return true;
  }

  async closeAll(): Promise<void> {
    const sessionIds = [...this.sessions.keys()];
    const results = await Promise.allSettled(sessionIds.map(sessionId => this.close(sessionId)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.warn(`Closing session ${sessionIds[index]} failed: ${describeError(result.reason)}`);
      }
    });
    if (sessionIds.length > 0) {
      this.logger.info(`Closed ${sessionIds.length} MCP session(s)`);
    }
  }

  private forget(transport: StreamableHTTPServerTransport): void {
    const sessionId = transport.sessionId;
    if (sessionId && this.sessions.get(sessionId)?.transport === transport) {
      this.sessions.delete(sessionId);
      this.logger.debug(`Session ${sessionId} ended by transport`);
    }
  }
}

function headerSessionId(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return Array.isArray(header) ? header[0] : header;
}

function bearerAuth(token: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (token && req.headers.authorization !== `Bearer ${token}`) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
}

/**
 * Streamable-HTTP MCP routes plus discovery. /mcp/info is public; with a
 * token set everything else needs `Authorization: Bearer <token>`.
 */
export function createMcpRouter(sessions: McpSessionRegistry, token?: string): Router {
  const router = Router();
  const logger = new Logger('MCP HTTP');
  const auth = bearerAuth(token);

  router.use(express.json());
  router.use(cors({
    origin: '*',
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id'],
    exposedHeaders: ['Mcp-Session-Id']
  }));

  const failed = (res: Response, error: unknown): void => {
    logger.error('MCP request failed:', error);
    if (!res.headersSent) {
      res.status(500).json({ error: 'Internal server error', message: describeError(error) });
    }
  };

  router.get('/mcp/info', (_req, res) => {
    const { name, version, description } = getPackageMetadata();
    res.set('Cache-Control', 'public, max-age=3600');
    res.json({ name, version, description, tools: toolRegistry });
  });

  router.post('/mcp/register', auth, (_req, res) => {
    const { name, version } = getPackageMetadata();
    res.set('Cache-Control', 'no-cache, no-store, must-revalidate');
    res.json({ name, version, capabilities: { tools: true, resources: false, prompts: false } });
  });

  router.post('/mcp', auth, async (req, res) => {
    const sessionId = headerSessionId(req);
    try {
      if (sessionId) {
        const session = sessions.get(sessionId);
        if (!session) {
          res.status(404).json({ error: 'Session not found' });
          return;
        }
        await session.transport.handleRequest(req, res, req.body);
        return;
      }

      if (!isInitializeRequest(req.body)) {
        res.status(400).json({ error: 'Bad request', message: 'A request without Mcp-Session-Id must be initialize' });
        return;
      }

      const opened = await sessions.open();
      await opened.transport.handleRequest(req, res, req.body);
      if (!opened.transport.sessionId) {
        // initialize was rejected; nothing will ever use this pair
        await opened.server.close();
      }
    } catch (error) {
      failed(res, error);
    }
  });

  router.get('/mcp', auth, async (req, res) => {
    const sessionId = headerSessionId(req);
    const session = sessionId ? sessions.get(sessionId) : undefined;
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    try {
      await session.transport.handleRequest(req, res);
    } catch (error) {
      failed(res, error);
    }
  });

  router.delete('/mcp', auth, async (req, res) => {
    const sessionId = headerSessionId(req);
    try {
      if (sessionId) {
        await sessions.close(sessionId);
      }
      res.status(204).send();
    } catch (error) {
      failed(res, error);
    }
  });

  return router;
}
