import express from 'express';
import { createApp } from '../../src/server';
import { CompatContext, createCompatContext } from '../../src/context';
import { captureLogs } from '../helpers';
import { componentJson, pick, request } from './http';

describe('Validation API', () => {
  captureLogs();
  let ctx: CompatContext;
  let app: express.Application;

  beforeEach(() => {
    ctx = createCompatContext();
    app = createApp(ctx);
  });

  test('GET /health', async () => {
    const res = await request(app, 'GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', version: '0.1.0', telemetrySchemaVersion: '1.0.0', swapsInFlight: 0 });
  });

  test('POST /api/validate returns a compatible verdict', async () => {
    const res = await request(app, 'POST', '/api/validate', {
      components: [componentJson('A', '1.2.0'), componentJson('B', '1.0.0')],
      edges: [{ consumerId: 'A', producerId: 'B', versionConstraint: '>=1.0.0' }],
    });

    expect(res.status).toBe(200);
    expect(pick(res.body, 'linkable')).toBe(true);
    expect(pick(res.body, 'verdict', 'outcome')).toBe('compatible');
    expect(pick(res.body, 'verdict', 'edges', 0, 'producerVersion')).toBe('1.0.0');
    expect(pick(res.body, 'traceId')).toEqual(expect.stringMatching(/^trc_/));
  });

  test('the versioned prefix serves the same routes', async () => {
    const res = await request(app, 'POST', '/api/v1/validate', { components: [], edges: [] });
    expect(res.status).toBe(200);
    expect(pick(res.body, 'verdict', 'outcome')).toBe('compatible');
  });

  test('an incompatible graph is still a 200 with the verdict', async () => {
    const res = await request(app, 'POST', '/api/validate', {
      components: [componentJson('A', '1.0.0'), componentJson('B', '2.0.0-alpha.1', 'experimental')],
      edges: [{ consumerId: 'A', producerId: 'B', versionConstraint: '*', requiredRangeStates: [] }],
    });
    expect(res.status).toBe(200);
    expect(pick(res.body, 'linkable')).toBe(false);
    expect(pick(res.body, 'verdict', 'offending', 0, 'reason')).toBe('stable consumer denies experimental producer');
  });

  test('telemetry for a validation is retrievable by trace id', async () => {
    const validated = await request(app, 'POST', '/api/validate', {
      components: [componentJson('A', '1.0.0'), componentJson('B', '1.0.0')],
      edges: [{ consumerId: 'A', producerId: 'B', versionConstraint: '^1.0.0' }],
    });
    const traceId = pick(validated.body, 'traceId');
    expect(typeof traceId).toBe('string');

    const res = await request(app, 'GET', `/api/telemetry?traceId=${String(traceId)}`);
    expect(res.status).toBe(200);
    expect(pick(res.body, 'total')).toBe(2);
    expect(pick(res.body, 'events', 0, 'kind')).toBe('edge.evaluated');
    expect(pick(res.body, 'events', 1, 'kind')).toBe('graph.verdict');
  });

  describe('rejected input', () => {
    test('malformed version text is a 400 VERSION.PARSE', async () => {
      const res = await request(app, 'POST', '/api/validate', {
        components: [componentJson('A', '1.x')],
        edges: [],
      });
      expect(res.status).toBe(400);
      expect(pick(res.body, 'error', 'code')).toBe('VERSION.PARSE');
    });

    test('malformed constraint text is a 400 CONSTRAINT.PARSE with a trace id', async () => {
      const res = await request(app, 'POST', '/api/validate', {
        components: [componentJson('A', '1.0.0')],
        edges: [{ consumerId: 'A', producerId: 'B', versionConstraint: '>=nope' }],
      });
      expect(res.status).toBe(400);
      expect(pick(res.body, 'error', 'code')).toBe('CONSTRAINT.PARSE');
      expect(pick(res.body, 'error', 'traceId')).toEqual(expect.stringMatching(/^trc_/));
    });

    test('an unknown range state is a 400 VALIDATION.SCHEMA naming the field', async () => {
      const res = await request(app, 'POST', '/api/validate', {
        components: [componentJson('A', '1.0.0', 'beta')],
        edges: [],
      });
      expect(res.status).toBe(400);
      expect(pick(res.body, 'error', 'code')).toBe('VALIDATION.SCHEMA');
      expect(pick(res.body, 'error', 'message')).toBe(
        'components[0].rangeState must be one of legacy, stable, experimental',
      );
    });

    test('missing arrays are rejected', async () => {
      const res = await request(app, 'POST', '/api/validate', { components: [] });
      expect(res.status).toBe(400);
      expect(pick(res.body, 'error', 'message')).toBe('edges must be an array');
    });

    test('a duplicate declaration is a 400', async () => {
      const res = await request(app, 'POST', '/api/validate', {
        components: [componentJson('A', '1.0.0'), componentJson('A', '1.0.0', 'legacy')],
        edges: [],
      });
      expect(res.status).toBe(400);
      expect(pick(res.body, 'error', 'code')).toBe('VALIDATION.DUPLICATE_COMPONENT');
    });

    test('a malformed JSON body is a 400', async () => {
      const res = await request(app, 'POST', '/api/validate', undefined, '{"components": [');
      expect(res.status).toBe(400);
      expect(pick(res.body, 'error', 'code')).toBe('VALIDATION.SCHEMA');
    });
  });
});
