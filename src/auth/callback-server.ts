import express, { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import logger from '../config/logger.js';

/**
 * What the listener sends back to the browser for one redirect
 */
export interface CallbackReply {
  status: number;
  contentType: 'text/html' | 'text/plain';
  body: string;
}

export type RedirectHandler = (query: URLSearchParams) => Promise<CallbackReply>;

const LOCAL_HOST = 'localhost';

/**
 * Short-lived HTTP listener that catches the OAuth redirect.
 * All flow state lives in the handler closure passed in by the owner.
 */
export class CallbackServer {
  private app: express.Application;
  private server: Server | null = null;
  private onRedirect: RedirectHandler;
  // Settle when the reply is delivered or the browser hangs up
  private inFlight = new Set<Promise<void>>();

  constructor(onRedirect: RedirectHandler) {
    this.onRedirect = onRedirect;
    this.app = express();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  private setupRoutes(): void {
    this.app.get('/', this.handleRedirect.bind(this));

    this.app.use((_req: Request, res: Response) => {
      res.status(404).type('text/plain').send('Not found');
    });
  }

  private handleRedirect(req: Request, res: Response, next: NextFunction): void {
    const query = new URL(req.originalUrl, `http://${LOCAL_HOST}`).searchParams;
    this.trackReply(res);

    this.onRedirect(query)
      .then((reply) => {
        if (res.destroyed) {
          logger.warn({ status: reply.status }, 'Browser closed the connection before the reply was sent');
          return;
        }
        res.status(reply.status).type(reply.contentType).send(reply.body);
      })
      .catch(next);
  }

  private trackReply(res: Response): void {
    const done = new Promise<void>((resolve) => {
      res.once('close', () => {
        this.inFlight.delete(done);
        resolve();
      });
    });
    this.inFlight.add(done);
  }

  private setupErrorHandler(): void {
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      logger.error({ error: err.message }, 'Redirect handling failed');
      res.status(500).type('text/plain').send('Internal error while handling the redirect.');
    });
  }

  /**
   * Start listening and resolve with the bound port (useful when port is 0)
   */
  async start(port: number): Promise<number> {
    return new Promise((resolve, reject) => {
      try {
        const server = this.app.listen(port, LOCAL_HOST, () => {
          const address = server.address();
          const boundPort = address && typeof address === 'object' ? address.port : port;
          logger.info({ port: boundPort }, 'Redirect listener started');
          resolve(boundPort);
        });
        server.on('error', reject);
        this.server = server;
      } catch (error) {
        reject(error);
      }
    });
  }

  /**
   * Let replies already being prepared reach the browser, then close the
   * listener and drop every connection
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await Promise.all(this.inFlight);

    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else {
          logger.info('Redirect listener stopped');
          resolve();
        }
      });
      // Browsers keep the connection alive; drop it so close() can finish
      server.closeAllConnections();
    });
  }

  getApp(): express.Application {
    return this.app;
  }
}
