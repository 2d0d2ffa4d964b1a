import type { Server } from 'http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { formatAppMessage } from '../../../shared/src';
import { logger } from '../logger';

export const DEFAULT_ROUTE = '/pcap';
export const DEFAULT_DELAY_EVERY = 20;
export const DEFAULT_DELAY_MS = 6_000;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 8989;
export const FILENAME_HEADER = 'x-filename';

export type MockUploadOptions = {
  routePath?: string;
  /** Every n-th request is held back before answering. */
  delayEvery?: number;
  delayMs?: number;
  bodyLimit?: string;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Request counter owned by one server instance; nothing is shared between instances. */
export class UploadCounter {
  private count = 0;

  next(): number {
    this.count += 1;
    return this.count;
  }

  get value(): number {
    return this.count;
  }
}

export function createMockUploadApp(options: MockUploadOptions = {}): { app: Express; counter: UploadCounter } {
  const routePath = options.routePath ?? DEFAULT_ROUTE;
  const delayEvery = Math.max(1, Math.trunc(options.delayEvery ?? DEFAULT_DELAY_EVERY));
  const delayMs = Math.max(0, options.delayMs ?? DEFAULT_DELAY_MS);
  const sleep = options.sleep ?? defaultSleep;
  const counter = new UploadCounter();
  const log = logger.child({ proc: 'MockUpload' });

  const app = express();
  app.disable('x-powered-by');

  // Any content type is taken as opaque bytes.
  app.post(routePath, express.raw({ type: () => true, limit: options.bodyLimit ?? '512mb' }), (req: Request, res: Response, next: NextFunction) => {
    const requestNumber = counter.next();
    const fileName = req.get(FILENAME_HEADER) ?? 'unknown';
    const size = Buffer.isBuffer(req.body) ? req.body.length : 0;

    log.info({ contentType: req.get('content-type') ?? null }, `Received Content-Type: ${req.get('content-type') ?? 'none'}`);
    log.info({ fileName, size, requestNumber }, formatAppMessage('upload.received', { fileName, size }).body);

    const respond = () => {
      res.status(200).type('text/plain').send('OK');
    };

    if (requestNumber % delayEvery === 0) {
      log.warn({ fileName, requestNumber, delayMs }, formatAppMessage('upload.delayed', { fileName, delayMs }).body);
      sleep(delayMs).then(respond, next);
      return;
    }
    respond();
  });

  return { app, counter };
}

export type MockUploadServerOptions = MockUploadOptions & {
  host?: string;
  port?: number;
};

export function startMockUploadServer(options: MockUploadServerOptions = {}): Promise<Server> {
  const { app } = createMockUploadApp(options);
  const host = options.host ?? DEFAULT_HOST;
  const port = options.port ?? DEFAULT_PORT;
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port, route: options.routePath ?? DEFAULT_ROUTE }, 'Mock upload endpoint listening');
      resolve(server);
    });
    server.once('error', reject);
  });
}
