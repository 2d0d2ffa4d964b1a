import type { Express } from 'express';
import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';
import { logger } from '../../packages/main/src/logger';
import { createMockUploadApp, startMockUploadServer } from '../../packages/main/src/mockUpload/server';

function upload(app: Express, fileName?: string) {
  const req = request(app).post('/pcap').set('Content-Type', 'application/octet-stream');
  return (fileName ? req.set('x-filename', fileName) : req).send(Buffer.from('test file content for pcap'));
}

describe('mock upload endpoint', () => {
  it('accepts an upload with a fixed OK response', async () => {
    const { app, counter } = createMockUploadApp({ sleep: vi.fn(async () => {}) });

    const res = await upload(app, 'MAH11-20231114-221320.pcap');

    expect(res.status).toBe(200);
    expect(res.text).toBe('OK');
    expect(counter.value).toBe(1);
    expect(logger.info).toHaveBeenCalledWith(
      { fileName: 'MAH11-20231114-221320.pcap', size: 26, requestNumber: 1 },
      "Received file 'MAH11-20231114-221320.pcap' (26 bytes)"
    );
  });

  it("falls back to 'unknown' without a filename header", async () => {
    const { app } = createMockUploadApp({ sleep: vi.fn(async () => {}) });
    await upload(app);
    expect(logger.info).toHaveBeenCalledWith({ fileName: 'unknown', size: 26, requestNumber: 1 }, "Received file 'unknown' (26 bytes)");
  });

  it('holds back every 20th request', async () => {
    const sleep = vi.fn(async () => {});
    const { app } = createMockUploadApp({ sleep });

    for (let i = 1; i <= 19; i += 1) {
      expect((await upload(app, `f${i}.pcap`)).status).toBe(200);
    }
    expect(sleep).not.toHaveBeenCalled();

    const twentieth = await upload(app, 'f20.pcap');
    expect(twentieth.status).toBe(200);
    expect(twentieth.text).toBe('OK');
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(6000);
  });

  it('keeps a separate counter per instance', async () => {
    const first = createMockUploadApp({ delayEvery: 2, sleep: vi.fn(async () => {}) });
    const second = createMockUploadApp({ delayEvery: 2, sleep: vi.fn(async () => {}) });

    await upload(first.app);
    await upload(first.app);
    await upload(second.app);

    expect(first.counter.value).toBe(2);
    expect(second.counter.value).toBe(1);
  });

  it('really waits when the default sleep is used', async () => {
    const { app } = createMockUploadApp({ delayEvery: 1, delayMs: 40 });
    const started = Date.now();
    const res = await upload(app);
    expect(res.status).toBe(200);
    expect(Date.now() - started).toBeGreaterThanOrEqual(35);
  });

  it('serves only POST on the configured route', async () => {
    const { app } = createMockUploadApp({ routePath: '/upload', sleep: vi.fn(async () => {}) });
    expect((await request(app).get('/upload')).status).toBe(404);
    expect((await request(app).post('/pcap').send('x')).status).toBe(404);
    expect((await request(app).post('/upload').send('x')).status).toBe(200);
  });

  it('listens on the given host and port', async () => {
    const server = await startMockUploadServer({ host: '127.0.0.1', port: 0 });
    try {
      const res = await request(server).post('/pcap').set('x-filename', 'listen.pcap').send('abc');
      expect(res.status).toBe(200);
      expect(res.text).toBe('OK');
    } finally {
      await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    }
  });
});
