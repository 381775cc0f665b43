/**
 * Node HTTP server for the routing API
 */

import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import type { Server } from 'node:net';
import type { RouterConfig } from '../config.js';
import type { RouterLogger } from '../logging/index.js';
import { createComponentLogger } from '../logging/index.js';
import type { RouterService } from '../service/index.js';
import { createRoutes } from './routes.js';

export interface RouterServerConfig {
  port: number;
  host: string;
  basePath: string;
}

export class RouterServer {
  private app: Hono;
  private server: Server | null = null;
  private config: RouterServerConfig;
  private logger: RouterLogger;

  constructor(
    service: RouterService,
    config: Partial<RouterServerConfig> = {},
    logger?: RouterLogger
  ) {
    this.config = {
      port: 3017,
      host: '0.0.0.0',
      basePath: '',
      ...config,
    };
    this.logger = logger ?? createComponentLogger('RouterServer');
    this.app = new Hono({ strict: false });
    this.app.route(this.config.basePath || '/', createRoutes(service, this.logger));
  }

  /**
   * Resolves once the server is listening
   */
  start(): Promise<void> {
    if (this.server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      const server: Server = serve({
        fetch: this.app.fetch,
        port: this.config.port,
        hostname: this.config.host,
      }, (info) => {
        this.logger.info('Routing API listening', { url: `http://${this.config.host}:${info.port}` });
        resolve();
      });

      server.once('error', (error: NodeJS.ErrnoException) => {
        this.server = null;
        if (error.code === 'EADDRINUSE') {
          this.logger.error(`Port ${this.config.port} already in use`, error);
        } else {
          this.logger.error('Routing API server error', error);
        }
        reject(error);
      });

      this.server = server;
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('Routing API stopped');
        resolve();
      });
    });
  }

  /**
   * The Hono app, for in-process requests
   */
  getApp(): Hono {
    return this.app;
  }

  getURL(): string {
    return `http://${this.config.host}:${this.config.port}${this.config.basePath}`;
  }

  isRunning(): boolean {
    return this.server !== null;
  }
}

/**
 * Builds a server from the `server` section of the config and starts it
 */
export async function startRouterServer(
  service: RouterService,
  config: RouterConfig,
  logger?: RouterLogger
): Promise<RouterServer> {
  const server = new RouterServer(service, { port: config.server.port, host: config.server.host }, logger);
  await server.start();
  return server;
}
