import express, { Express, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import type { JobUpdate, RenderOrchestrator } from '../../application/services/RenderOrchestrator.js';
import type { DatabaseConnection } from '../database/DatabaseConnection.js';
import { errorMessage, isOrchestratorError } from '../../core/errors/OrchestratorError.js';

export const OWNER_HEADER = 'x-owner-id';

export interface WebServerOptions {
  port: number;
  maxUploadBytes: number;
  version: string;
}

type BroadcastMessage =
  | { type: 'connected'; timestamp: string }
  | ({ type: 'job_updated'; timestamp: string } & JobUpdate);

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

function attachmentHeader(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();

  constructor(
    private orchestrator: RenderOrchestrator,
    private database: DatabaseConnection,
    private options: WebServerOptions
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.orchestrator.onJobUpdated((update) => this.notifyJobUpdate(update));
  }

  /**
   * Bound port; differs from the configured one when that was 0
   */
  getPort(): number {
    const address = this.httpServer?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.options.port;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
  }

  private setupRoutes(): void {
    // API: Submit a render; the request body is the raw model file
    this.app.post(
      '/api/renders',
      express.raw({ type: () => true, limit: this.options.maxUploadBytes }),
      async (req: Request, res: Response) => {
        try {
          const { filename, ...options } = req.query;
          const data: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
          const ownerId = req.header(OWNER_HEADER)?.trim() || undefined;

          const jobId = await this.orchestrator.submit(
            { filename: firstString(filename) ?? '', data },
            options,
            ownerId
          );
          res.status(202).json({ success: true, data: { jobId } });
        } catch (error) {
          this.sendError(res, error);
        }
      }
    );

    // API: Get render status
    this.app.get('/api/renders/:id', (req: Request, res: Response) => {
      try {
        res.json({ success: true, data: this.orchestrator.query(req.params.id) });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Cancel render
    this.app.post('/api/renders/:id/cancel', async (req: Request, res: Response) => {
      try {
        const view = await this.orchestrator.cancel(req.params.id);
        res.json({ success: true, data: view });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Download the finished video
    this.app.get('/api/renders/:id/artifact', async (req: Request, res: Response) => {
      try {
        const artifact = await this.orchestrator.fetchArtifact(req.params.id);
        res.setHeader('Content-Type', artifact.mimeType);
        res.setHeader('Content-Length', String(artifact.size));
        res.setHeader('Content-Disposition', attachmentHeader(artifact.downloadName));

        artifact.stream.on('error', (error) => {
          console.error(`[WebServer] Artifact stream failed for ${req.params.id}: ${error.message}`);
          res.destroy(error);
        });
        res.on('close', () => artifact.stream.destroy());
        artifact.stream.pipe(res);
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Forget a finished render
    this.app.delete('/api/renders/:id', async (req: Request, res: Response) => {
      try {
        await this.orchestrator.remove(req.params.id);
        res.json({ success: true, message: 'Render removed' });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Get statistics
    this.app.get('/api/stats', (req: Request, res: Response) => {
      try {
        const ownerId = req.header(OWNER_HEADER)?.trim() || undefined;
        res.json({
          success: true,
          data: {
            jobs: this.orchestrator.getStatistics(),
            ownerRunning: ownerId ? this.orchestrator.countRunning(ownerId) : undefined,
            database: this.database.getStatistics(),
          },
        });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.get('/api/health', (req: Request, res: Response) => {
      res.json({ success: true, data: { status: 'ok', version: this.options.version } });
    });
  }

  private sendError(res: Response, error: unknown): void {
    if (res.headersSent) {
      res.destroy();
      return;
    }

    if (isOrchestratorError(error)) {
      res.status(error.httpStatus).json({ success: false, error: error.message, code: error.code });
      return;
    }

    console.error('[WebServer] Request failed:', error);
    res.status(500).json({ success: false, error: errorMessage(error) });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      console.log('[WebServer] New WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        console.log('[WebServer] WebSocket client disconnected');
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });

      // Send initial connection confirmation
      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() }));
    });
  }

  public broadcast(message: BroadcastMessage): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  public notifyJobUpdate(update: JobUpdate): void {
    this.broadcast({
      type: 'job_updated',
      ...update,
      timestamp: new Date().toISOString(),
    });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.httpServer = this.app.listen(this.options.port, () => {
          console.log(`[WebServer] Backend API available at http://localhost:${this.getPort()}`);
          this.setupWebSocket();
          resolve();
        });

        this.httpServer.on('error', (error) => {
          console.error('[WebServer] Server error:', error);
          reject(error);
        });
      } catch (error) {
        reject(error);
      }
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      // Close all WebSocket connections
      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      // Close WebSocket server
      if (this.wss) {
        this.wss.close(() => {
          console.log('[WebServer] WebSocket server closed');
        });
        this.wss = null;
      }

      // Close HTTP server
      if (this.httpServer) {
        this.httpServer.close(() => {
          console.log('[WebServer] HTTP server closed');
          resolve();
        });
        this.httpServer.closeAllConnections();
        this.httpServer = null;
      } else {
        resolve();
      }
    });
  }
}
