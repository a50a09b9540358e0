import { FanOutTelemetrySink, LoggerTelemetrySink, MemoryTelemetrySink } from '../../src/telemetry/sinks';
import { TraceContext } from '../../src/telemetry/trace';
import { TelemetrySink } from '../../src/domain/telemetry';
import { LogLevel } from '../../src/logger';
import { captureLogs } from '../helpers';

describe('MemoryTelemetrySink', () => {
  async function populated(): Promise<MemoryTelemetrySink> {
    const sink = new MemoryTelemetrySink();
    const one = new TraceContext('trc_one');
    const two = new TraceContext('trc_two');
    await sink.deliver(one.event({ kind: 'edge.evaluated', componentIds: ['A', 'B'] }));
    await sink.deliver(two.event({ kind: 'instance.registered', componentIds: ['C'] }));
    await sink.deliver(one.event({ kind: 'graph.verdict', componentIds: ['A', 'B'] }));
    return sink;
  }

  test('indexes events by trace', async () => {
    const sink = await populated();
    expect(sink.byTrace('trc_one').map((e) => e.kind)).toEqual(['edge.evaluated', 'graph.verdict']);
    expect(sink.byTrace('trc_missing')).toEqual([]);
    expect(sink.size).toBe(3);
  });

  test('filters by component and kind', async () => {
    const sink = await populated();
    expect(sink.query({ componentId: 'C' }).map((e) => e.traceId)).toEqual(['trc_two']);
    expect(sink.query({ kinds: ['graph.verdict', 'instance.registered'] }).map((e) => e.kind)).toEqual([
      'instance.registered',
      'graph.verdict',
    ]);
  });

  test('pages with limit and offset', async () => {
    const sink = await populated();
    expect(sink.query({ offset: 1, limit: 1 }).map((e) => e.kind)).toEqual(['instance.registered']);
    expect(sink.query({ traceId: 'trc_one', offset: 1 }).map((e) => e.kind)).toEqual(['graph.verdict']);
  });
});

describe('LoggerTelemetrySink', () => {
  const logs = captureLogs();

  test('logs low-severity events at info and severe ones at error', async () => {
    const sink = new LoggerTelemetrySink();
    const trace = new TraceContext('trc_log');
    await sink.deliver(trace.event({ kind: 'swap.completed', componentIds: ['A'], detail: { toVersion: '1.1.0' } }));
    await sink.deliver(trace.event({ kind: 'swap.failed', componentIds: ['A'], severity: 4 }));

    expect(logs.map((e) => [e.level, e.message])).toEqual([
      [LogLevel.Info, 'Decision event swap.completed'],
      [LogLevel.Error, 'Decision event swap.failed'],
    ]);
    expect(logs[0].context).toMatchObject({
      component: 'telemetry-sink',
      traceId: 'trc_log',
      sequence: 1,
      toVersion: '1.1.0',
    });
  });
});

describe('FanOutTelemetrySink', () => {
  test('delivers to every sink', async () => {
    const a = new MemoryTelemetrySink();
    const b = new MemoryTelemetrySink();
    await new FanOutTelemetrySink([a, b]).deliver(
      new TraceContext().event({ kind: 'graph.verdict', componentIds: [] }),
    );
    expect([a.size, b.size]).toEqual([1, 1]);
  });

  test('still delivers to healthy sinks when one fails, then rethrows', async () => {
    const healthy = new MemoryTelemetrySink();
    const broken: TelemetrySink = {
      deliver: async () => {
        throw new Error('down');
      },
    };
    const fanOut = new FanOutTelemetrySink([broken, healthy]);
    await expect(
      fanOut.deliver(new TraceContext().event({ kind: 'graph.verdict', componentIds: [] })),
    ).rejects.toThrow('down');
    expect(healthy.size).toBe(1);
  });
});
