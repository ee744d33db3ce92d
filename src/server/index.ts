import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { createServer, type Server } from 'http';
import { WebSocketServer } from 'ws';
import { StreamChannel } from '../channels/stream.js';
import type { StreamRegistry } from '../streaming/registry.js';
import type { ToolDispatcher } from '../tools/dispatcher.js';
import { toToolResult } from '../tools/envelope.js';
import type { UploadedFile } from '../tools/types.js';
import type { WorkflowSupervisor } from '../workflows/supervisor.js';
import {
  idOf,
  rpcError,
  rpcRequestSchema,
  rpcResult,
  RpcErrorCode,
  toolCallParamsSchema,
  type RpcRequest,
} from './protocol.js';

export interface ServerConfig {
  port: number;
  host?: string;
  serverName: string;
  serverVersion: string;
  dispatcher: ToolDispatcher;
  streams: StreamRegistry;
  supervisor: WorkflowSupervisor;
  maxUploadBytes: number;
}

export class ToolServer {
  private app: Express;
  private server: Server;
  private wss: WebSocketServer;
  private streamChannel: StreamChannel;
  private config: ServerConfig;
  private upload: multer.Multer;

  constructor(config: ServerConfig) {
    this.config = config;

    // Create Express app
    this.app = express();

    // Enable CORS for all origins
    this.app.use(cors({
      origin: '*',
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    }));
    this.app.use(express.json({ limit: '10mb' }));

    this.upload = multer({
      storage: multer.memoryStorage(),
      limits: { fileSize: config.maxUploadBytes, files: 1 },
    });

    // Create HTTP server
    this.server = createServer(this.app);

    // Create WebSocket server - attach to HTTP server
    this.wss = new WebSocketServer({
      server: this.server,
      path: '/ws',
    });

    this.streamChannel = new StreamChannel(config.streams);

    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get('/', (_req: Request, res: Response) => {
      res.json({
        service: this.config.serverName,
        status: 'running',
        tools: this.config.dispatcher.toolCount,
      });
    });

    // Health check
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    this.app.post('/mcp', this.upload.single('file'), (req: Request, res: Response) => {
      this.handleRpc(req, res).catch((error: unknown) => {
        console.error('[Server] Unhandled /mcp error:', error);
        if (!res.headersSent) {
          const message = error instanceof Error ? error.message : String(error);
          res.status(500).json(rpcError(null, RpcErrorCode.INTERNAL_ERROR, message));
        }
      });
    });

    // Body parser and upload failures arrive here, before any handler runs
    this.app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      if (error instanceof SyntaxError) {
        res.status(400).json(rpcError(null, RpcErrorCode.PARSE_ERROR, 'Parse error'));
        return;
      }
      if (error instanceof multer.MulterError) {
        res.status(400).json(rpcError(null, RpcErrorCode.INVALID_REQUEST, `Upload rejected: ${error.message}`));
        return;
      }
      console.error('[Server] Request error:', error);
      const message = error instanceof Error ? error.message : String(error);
      res.status(500).json(rpcError(null, RpcErrorCode.INTERNAL_ERROR, message));
    });
  }

  private async handleRpc(req: Request, res: Response): Promise<void> {
    const body = this.readEnvelope(req, res);
    if (body === undefined) {
      return;
    }

    const parsed = rpcRequestSchema.safeParse(body);
    if (!parsed.success) {
      res.status(400).json(rpcError(idOf(body), RpcErrorCode.INVALID_REQUEST, 'Invalid Request'));
      return;
    }

    const request = parsed.data;
    try {
      await this.dispatchRpc(request, req.file, res);
    } catch (error) {
      console.error(`[Server] ${request.method} failed:`, error);
      const message = error instanceof Error ? error.message : String(error);
      res.status(500).json(rpcError(request.id, RpcErrorCode.INTERNAL_ERROR, message));
    }
  }

  /**
   * The envelope is the JSON body, or the `jsonrpc` field of a multipart
   * form. Returns undefined after answering an unreadable request.
   */
  private readEnvelope(req: Request, res: Response): unknown {
    const body: unknown = req.body;

    if (!req.is('multipart/form-data')) {
      return body;
    }

    const field = typeof body === 'object' && body !== null && 'jsonrpc' in body ? body.jsonrpc : undefined;
    if (typeof field !== 'string' || !field) {
      res.status(400).json(rpcError(null, RpcErrorCode.INVALID_REQUEST, 'Missing jsonrpc field'));
      return undefined;
    }
    try {
      const envelope: unknown = JSON.parse(field);
      return envelope;
    } catch {
      res.status(400).json(rpcError(null, RpcErrorCode.PARSE_ERROR, 'Invalid jsonrpc JSON'));
      return undefined;
    }
  }

  private async dispatchRpc(request: RpcRequest, file: Request['file'], res: Response): Promise<void> {
    switch (request.method) {
      case 'initialize':
        res.json(rpcResult(request.id, {
          protocolVersion: '1.0',
          serverInfo: { name: this.config.serverName, version: this.config.serverVersion },
          capabilities: { tools: {} },
        }));
        return;

      case 'tools/list':
        res.json(rpcResult(request.id, { tools: this.config.dispatcher.listTools() }));
        return;

      case 'tools/call': {
        const params = toolCallParamsSchema.safeParse(request.params);
        if (!params.success) {
          res.json(rpcError(request.id, RpcErrorCode.INVALID_PARAMS, 'Invalid params: tools/call needs a tool name'));
          return;
        }
        const attachment: UploadedFile | undefined = file && {
          filename: file.originalname,
          mimeType: file.mimetype || 'application/octet-stream',
          bytes: file.buffer,
        };
        const result = await this.config.dispatcher.execute(params.data.name, params.data.arguments, attachment);
        res.json(rpcResult(request.id, toToolResult(result)));
        return;
      }

      default:
        if (request.method.startsWith('notifications/')) {
          res.status(202).end();
          return;
        }
        res.json(rpcError(request.id, RpcErrorCode.METHOD_NOT_FOUND, 'Method not found'));
    }
  }

  get port(): number {
    const address = this.server.address();
    return address && typeof address === 'object' ? address.port : this.config.port;
  }

  async start(): Promise<void> {
    this.wss.on('error', (error) => {
      console.error('[Streams] WebSocket server error:', error);
    });

    this.streamChannel.attachToServer(this.wss);

    const host = this.config.host ?? '0.0.0.0';
    // Start listening
    return new Promise((resolve) => {
      this.server.listen(this.config.port, host, () => {
        console.log(`[Server] HTTP server listening on http://${host}:${this.port}`);
        console.log(`[Server] Stream endpoint ready on ws://${host}:${this.port}/ws?threadId=<id>`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    await this.config.supervisor.cancelAll();
    this.streamChannel.closeAll();
    return new Promise((resolve, reject) => {
      this.wss.close(() => {
        this.server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    });
  }
}
