import express, { type Express } from 'express';
import type { Server } from 'http';
import os from 'os';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { Logger } from './logger.js';
import { McpSessionRegistry, createMcpRouter } from './mcp-http-transport.js';
import { getNotifications, registerMcpTools } from './mcp-tools.js';
import type { HealthMonitor } from './monitor.js';
import { VITAL_FIELDS, type VitalField } from './types.js';
import { getPackageMetadata } from './utils.js';

const notificationsQuery = z.object({
  since: z.string().default('0'),
  hex: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100)
});

/**
 * Observability Server - read-only HTTP view of the monitor plus MCP tools
 *
 * This server provides:
 * - GET /health, /vitals, /session, /notifications
 * - MCP tools over streamable HTTP (/mcp, /mcp/info, /mcp/register)
 *
 * It observes the monitor; scan/connect/disconnect go through MCP only.
 */
export class ObservabilityServer {
  private readonly mcpSessions: McpSessionRegistry;
  private httpServer: Server | null = null;
  private logger = new Logger('Observability');

  constructor(private readonly monitor: HealthMonitor, private readonly token?: string) {
    this.mcpSessions = new McpSessionRegistry(() => this.createMcpServer());
  }

  /** One per MCP session, all driving the same monitor. */
  createMcpServer(): McpServer {
    const { name, version } = getPackageMetadata();
    const server = new McpServer({ name, version });
    registerMcpTools(server, this.monitor);
    return server;
  }

  createApp(): Express {
    const app = express();

    app.get('/health', (_req, res) => {
      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        hostname: os.hostname(),
        monitor: this.monitor.getStatus(),
        mcp: {
          sessions: this.mcpSessions.size,
          httpAuth: !!this.token
        }
      });
    });

    app.get('/vitals', (_req, res) => {
      const updatedAt: Partial<Record<VitalField, string>> = {};
      for (const field of VITAL_FIELDS) {
        const at = this.monitor.store.getUpdatedAt(field);
        if (at) {
          updatedAt[field] = at.toISOString();
        }
      }
      res.json({
        snapshot: this.monitor.getSnapshot(),
        updatedAt,
        timestamp: new Date().toISOString()
      });
    });

    app.get('/session', (_req, res) => {
      res.json({ session: this.monitor.getSessionInfo() });
    });

    app.get('/notifications', async (req, res) => {
      const query = notificationsQuery.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({
          error: 'Invalid query',
          message: query.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
        });
        return;
      }

      try {
        const { since, hex, limit } = query.data;
        const result = await getNotifications(this.monitor, {
          since,
          limit,
          ...(hex ? { hex_pattern: hex } : {})
        });
        const first = result.content[0];
        res.type('application/json').send(first && first.type === 'text' ? first.text : '{}');
      } catch (error) {
        this.logger.error('Error in /notifications:', error);
        res.status(500).json({
          error: 'Internal server error',
          message: error instanceof Error ? error.message : String(error)
        });
      }
    });

    app.use(createMcpRouter(this.mcpSessions, this.token));

    return app;
  }

  async startHttp(port = 8081, host = '0.0.0.0'): Promise<number> {
    const app = this.createApp();

    const server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(port, host, () => resolve(listening));
      listening.once('error', reject);
    });
    this.httpServer = server;

    const address = server.address();
    const actualPort = address && typeof address !== 'string' ? address.port : port;
    this.logger.info(`Observability server listening on ${host}:${actualPort}`);
    this.logger.info(`   Health check: http://localhost:${actualPort}/health`);
    this.logger.info(`   MCP info: http://localhost:${actualPort}/mcp/info`);
    if (this.token) {
      this.logger.info('   Authentication: Bearer token required for MCP');
    } else {
      this.logger.warn('   Authentication: none (local network only!)');
    }
    return actualPort;
  }

  getMcpSessionCount(): number {
    return this.mcpSessions.size;
  }

  async stop(): Promise<void> {
    await this.mcpSessions.closeAll();
    const server = this.httpServer;
    this.httpServer = null;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }
}
