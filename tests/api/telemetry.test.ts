import express from 'express';
import { createApp } from '../../src/server';
import { CompatContext, createCompatContext } from '../../src/context';
import { captureLogs, component } from '../helpers';
import { pick, request } from './http';

describe('Telemetry API', () => {
  captureLogs();
  let ctx: CompatContext;
  let app: express.Application;

  beforeEach(() => {
    ctx = createCompatContext({ telemetryQueueCapacity: 64 });
    app = createApp(ctx);
    ctx.engine.register(component('A', '1.0.0'), { traceId: 'trc_a' });
    ctx.engine.register(component('B', '1.0.0'), { traceId: 'trc_b' });
    ctx.engine.retire('B', { traceId: 'trc_b' });
  });

  test('GET /api/telemetry filters by component and kind', async () => {
    const byComponent = await request(app, 'GET', '/api/telemetry?componentId=B');
    expect(pick(byComponent.body, 'total')).toBe(3);

    const byKind = await request(app, 'GET', '/api/telemetry?kinds=instance.registered,unknown.kind');
    expect(pick(byKind.body, 'total')).toBe(2);
    expect(pick(byKind.body, 'events', 1, 'componentIds')).toEqual(['B']);
  });

  test('GET /api/telemetry pages results', async () => {
    const res = await request(app, 'GET', '/api/telemetry?limit=1&offset=1');
    expect(pick(res.body, 'total')).toBe(4);
    expect(pick(res.body, 'events', 0, 'traceId')).toBe('trc_b');
    expect(pick(res.body, 'events', 1)).toBeUndefined();
  });

  test('GET /api/telemetry/stats reports the core status', async () => {
    const res = await request(app, 'GET', '/api/telemetry/stats');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      telemetry: { queued: 0, capacity: 64, delivered: 4, dropped: 0, failed: 0 },
      eventsRecorded: 4,
      registeredComponents: 2,
      swapsInFlight: [],
    });
  });

  test('GET /api/telemetry/export returns the export document', async () => {
    const res = await request(app, 'GET', '/api/telemetry/export');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ schemaVersion: '1.0.0', count: 4, maxSeverity: 1, traces: ['trc_a', 'trc_b'] });
  });
});
