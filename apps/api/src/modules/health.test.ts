import { describe, it, expect, vi } from 'vitest';
import type { Request, Response } from 'express';
import { createHealthHandler, rootHandler } from './health';
import { metricsHandler } from './metrics/routes';

function mockRes() {
  const res = {
    json: vi.fn().mockReturnThis(),
    send: vi.fn().mockReturnThis(),
    setHeader: vi.fn(),
  };
  return { res, response: res as unknown as Response };
}

const req = {} as Request;

describe('health endpoints', () => {
  it('GET / reports the service as running', () => {
    const { res, response } = mockRes();

    rootHandler(req, response);

    expect(res.json).toHaveBeenCalledWith({
      message: 'Report Merge API',
      status: 'running',
      timestamp: expect.any(String),
    });
  });

  it('GET /health reports version and whether settings resolved', () => {
    const { res, response } = mockRes();

    createHealthHandler({ configLoaded: () => true })(req, response);

    expect(res.json).toHaveBeenCalledWith({
      status: 'healthy',
      version: '0.1.0',
      timestamp: expect.any(String),
      config_loaded: true,
    });
  });
});

describe('GET /metrics', () => {
  it('serves Prometheus text', () => {
    const { res, response } = mockRes();

    metricsHandler(req, response);

    expect(res.setHeader).toHaveBeenCalledWith('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    expect(res.send).toHaveBeenCalledWith(expect.stringContaining('# TYPE merge_runs_total counter'));
  });
});
