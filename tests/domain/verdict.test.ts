import { EdgeOutcome, EdgeVerdict, aggregateVerdict, isLinkable, worseOutcome } from '../../src/domain/verdict';
import { edgeKey, componentKey } from '../../src/domain/component';
import { component, edge } from '../helpers';

function verdict(outcome: EdgeOutcome, consumerId = 'A'): EdgeVerdict {
  return { edge: edge(consumerId, 'B'), outcome };
}

describe('verdict aggregation', () => {
  test('worseOutcome picks the more severe outcome', () => {
    expect(worseOutcome(EdgeOutcome.Compatible, EdgeOutcome.Degraded)).toBe(EdgeOutcome.Degraded);
    expect(worseOutcome(EdgeOutcome.RequiresOverride, EdgeOutcome.Degraded)).toBe(EdgeOutcome.RequiresOverride);
    expect(worseOutcome(EdgeOutcome.Incompatible, EdgeOutcome.RequiresOverride)).toBe(EdgeOutcome.Incompatible);
  });

  test('the aggregate does not depend on edge order', () => {
    const edges = [
      verdict(EdgeOutcome.Degraded, 'A'),
      verdict(EdgeOutcome.Compatible, 'C'),
      verdict(EdgeOutcome.RequiresOverride, 'D'),
    ];
    expect(aggregateVerdict(edges).outcome).toBe(EdgeOutcome.RequiresOverride);
    expect(aggregateVerdict([...edges].reverse()).outcome).toBe(EdgeOutcome.RequiresOverride);
  });

  test('offending keeps every non-compatible edge in order', () => {
    const graph = aggregateVerdict([
      verdict(EdgeOutcome.Incompatible, 'A'),
      verdict(EdgeOutcome.Compatible, 'C'),
      verdict(EdgeOutcome.Degraded, 'D'),
    ]);
    expect(graph.offending.map((v) => v.edge.consumerId)).toEqual(['A', 'D']);
  });

  test('only incompatible graphs are not linkable', () => {
    expect(isLinkable(aggregateVerdict([verdict(EdgeOutcome.RequiresOverride)]))).toBe(true);
    expect(isLinkable(aggregateVerdict([verdict(EdgeOutcome.Incompatible)]))).toBe(false);
  });
});

describe('component keys', () => {
  test('componentKey includes the prerelease', () => {
    expect(componentKey(component('auth', '1.2.3'))).toBe('auth@1.2.3');
    expect(componentKey(component('auth', '1.2.3-rc.1'))).toBe('auth@1.2.3-rc.1');
  });

  test('edgeKey joins consumer and producer', () => {
    expect(edgeKey(edge('web', 'auth'))).toBe('web->auth');
  });
});
