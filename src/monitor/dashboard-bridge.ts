import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { createServer, Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import { WebSocketServer, WebSocket } from 'ws';
import path from 'path';
import type { ChartRenderer } from './charts';
import type { RollingHistoryStore } from './history';
import { createLogger } from './logger';
import type { ChartPayload, PresentationMode } from './types';

export type DashboardMessage =
    | { type: 'init'; mode: PresentationMode; heading: string; charts: ChartPayload[] }
    | { type: 'charts'; charts: ChartPayload[] };

export interface DashboardBridgeOptions {
    store: RollingHistoryStore;
    renderer: ChartRenderer;
    publicDir?: string;
}

const DEFAULT_PUBLIC_DIR = path.resolve(__dirname, '../../public');

const logger = createLogger('Dashboard');

/**
 * Serves the browser dashboard. Every request renders from a fresh store
 * snapshot; ticks are pushed to connected sockets through `broadcastCharts`.
 */
export class DashboardBridge {
    private app = express();
    private server: HttpServer;
    private wss: WebSocketServer;
    private clients: Set<WebSocket> = new Set();

    private readonly store: RollingHistoryStore;
    private readonly renderer: ChartRenderer;

    constructor(options: DashboardBridgeOptions) {
        this.store = options.store;
        this.renderer = options.renderer;

        this.server = createServer(this.app);
        this.wss = new WebSocketServer({ server: this.server });

        this.setupExpress(options.publicDir ?? DEFAULT_PUBLIC_DIR);
        this.setupWebSocket();
    }

    private setupExpress(publicDir: string): void {
        // Chart.js is loaded from jsDelivr
        this.app.use((_req, res, next) => {
            res.setHeader(
                'Content-Security-Policy',
                "default-src 'self' 'unsafe-inline' https://cdn.jsdelivr.net; connect-src 'self' ws: wss:"
            );
            next();
        });

        this.app.use(express.static(publicDir));

        this.app.get('/api/charts', (_req, res) => {
            res.json({
                mode: this.renderer.mode,
                heading: this.renderer.heading,
                charts: this.renderCharts()
            });
        });

        this.app.get('/api/history', (_req, res) => {
            res.json(this.store.snapshot());
        });

        this.app.get('/api/health', (_req, res) => {
            res.json({
                status: 'ok',
                mode: this.renderer.mode,
                samples: this.store.size,
                capacity: this.store.capacity,
                latest: this.store.latest()
            });
        });

        this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
            logger.error('Request failed:', error);
            res.status(500).json({ error: error instanceof Error ? error.message : 'Internal error' });
        });
    }

    private setupWebSocket(): void {
        // The HTTP server's errors are re-emitted here
        this.wss.on('error', (error) => {
            logger.error('WebSocket server error:', error);
        });

        this.wss.on('connection', (ws) => {
            this.clients.add(ws);

            this.send(ws, {
                type: 'init',
                mode: this.renderer.mode,
                heading: this.renderer.heading,
                charts: this.renderCharts()
            });

            ws.on('close', () => {
                this.clients.delete(ws);
            });
            ws.on('error', (error) => {
                logger.warn('Socket error:', error);
                this.clients.delete(ws);
            });
        });
    }

    private renderCharts(): ChartPayload[] {
        return this.renderer.render(this.store.snapshot());
    }

    start(port: number, host: string): Promise<AddressInfo> {
        return new Promise((resolve, reject) => {
            const onError = (error: Error): void => {
                reject(error);
            };
            this.server.once('error', onError);
            this.server.listen(port, host, () => {
                this.server.off('error', onError);
                const address = this.server.address();
                if (address === null || typeof address === 'string') {
                    reject(new Error('Dashboard server is not listening on a TCP port'));
                    return;
                }
                logger.log(`Dashboard ready at http://${host}:${address.port}`);
                resolve(address);
            });
        });
    }

    async stop(): Promise<void> {
        for (const ws of this.clients) {
            ws.terminate();
        }
        this.clients.clear();

        await new Promise<void>((resolve, reject) => {
            this.wss.close((error) => (error ? reject(error) : resolve()));
        });
        await new Promise<void>((resolve, reject) => {
            this.server.close((error) => (error ? reject(error) : resolve()));
        });
    }

    getClientCount(): number {
        return this.clients.size;
    }

    broadcastCharts(charts: ChartPayload[]): void {
        const msg = JSON.stringify({ type: 'charts', charts } satisfies DashboardMessage);
        this.clients.forEach(ws => {
            if (ws.readyState === WebSocket.OPEN) {
                ws.send(msg);
            }
        });
    }

    private send(ws: WebSocket, message: DashboardMessage): void {
        ws.send(JSON.stringify(message));
    }
}
