import {
  attributeLookupFromMap,
  AttributeType,
  createAttribute,
  createIntegerIdProvider,
  createToStringIdProvider,
  DEFAULT_EDGE_WEIGHT,
  DefaultEdge,
  SimpleGraph,
} from '@gmlkit/graph'
import { describe, expect, it } from 'vitest'

describe('SimpleGraph', () => {
  it('defaults to a directed, unweighted graph', () => {
    const g = new SimpleGraph<string, DefaultEdge<string>>()
    expect(g.getType()).toEqual({ directed: true, weighted: false })
  })

  it('iterates vertices and edges in insertion order', () => {
    const g = new SimpleGraph<string, string>({ directed: false })
    g.addVertex('c')
    g.addVertex('a')
    g.addVertex('b')
    g.addEdge('a', 'b', 'ab')
    g.addEdge('c', 'a', 'ca')

    expect([...g.vertexSet()]).toEqual(['c', 'a', 'b'])
    expect([...g.edgeSet()]).toEqual(['ab', 'ca'])
    expect(g.getEdgeSource('ca')).toBe('c')
    expect(g.getEdgeTarget('ca')).toBe('a')
  })

  it('ignores a repeated vertex', () => {
    const g = new SimpleGraph<string, string>()
    expect(g.addVertex('a')).toBe(true)
    expect(g.addVertex('a')).toBe(false)
    expect(g.vertexCount).toBe(1)
  })

  it('accepts self-loops and parallel edges', () => {
    const g = new SimpleGraph<string, DefaultEdge<string>>()
    g.addVertex('a')
    g.addVertex('b')
    g.addEdge('a', 'a', new DefaultEdge('a', 'a'))
    g.addEdge('a', 'b', new DefaultEdge('a', 'b'))
    g.addEdge('a', 'b', new DefaultEdge('a', 'b'))
    expect(g.edgeCount).toBe(3)
  })

  it('rejects edges with unknown endpoints', () => {
    const g = new SimpleGraph<string, string>()
    g.addVertex('a')
    expect(() => g.addEdge('a', 'z', 'az')).toThrow('Unknown target vertex: z')
    expect(() => g.addEdge('z', 'a', 'za')).toThrow('Unknown source vertex: z')
  })

  it('rejects a repeated edge value', () => {
    const g = new SimpleGraph<string, string>()
    g.addVertex('a')
    g.addEdge('a', 'a', 'loop')
    expect(() => g.addEdge('a', 'a', 'loop')).toThrow('Edge already present: loop')
  })

  it('reports stored weights only for weighted graphs', () => {
    const weighted = new SimpleGraph<string, string>({ weighted: true })
    weighted.addVertex('a')
    weighted.addEdge('a', 'a', 'e', 2.5)
    expect(weighted.getEdgeWeight('e')).toBe(2.5)
    weighted.setEdgeWeight('e', 4)
    expect(weighted.getEdgeWeight('e')).toBe(4)

    const plain = new SimpleGraph<string, string>()
    plain.addVertex('a')
    plain.addEdge('a', 'a', 'e', 2.5)
    expect(plain.getEdgeWeight('e')).toBe(DEFAULT_EDGE_WEIGHT)
    expect(() => plain.setEdgeWeight('e', 3)).toThrow(TypeError)
  })

  it('throws for unknown edges', () => {
    const g = new SimpleGraph<string, string>()
    expect(() => g.getEdgeSource('nope')).toThrow('Unknown edge: nope')
  })
})

describe('DefaultEdge', () => {
  it('displays as (source : target)', () => {
    expect(String(new DefaultEdge('a', 'b'))).toBe('(a : b)')
    expect(String(new DefaultEdge(1, 2))).toBe('(1 : 2)')
  })
})

describe('attributes', () => {
  it('createAttribute infers the attribute type', () => {
    expect(createAttribute('hub')).toEqual({ type: AttributeType.String, value: 'hub' })
    expect(createAttribute(3)).toEqual({ type: AttributeType.Int, value: '3' })
    expect(createAttribute(0.5)).toEqual({ type: AttributeType.Double, value: '0.5' })
    expect(createAttribute(true)).toEqual({ type: AttributeType.Boolean, value: 'true' })
    expect(createAttribute(null)).toEqual({ type: AttributeType.Null, value: 'null' })
  })

  it('attributeLookupFromMap finds attributes by element and key', () => {
    const lookup = attributeLookupFromMap(new Map([
      ['a', { label: createAttribute('hub') }],
    ]))

    expect(lookup('a', 'label')?.value).toBe('hub')
    expect(lookup('a', 'color')).toBeUndefined()
    expect(lookup('b', 'label')).toBeUndefined()
  })

  it('attributeLookupFromMap ignores inherited keys', () => {
    const lookup = attributeLookupFromMap(new Map([['a', {}]]))
    expect(lookup('a', 'toString')).toBeUndefined()
  })
})

describe('id providers', () => {
  it('integer provider assigns ids in first-request order from zero', () => {
    const ids = createIntegerIdProvider<string>()
    expect(ids('x')).toBe('0')
    expect(ids('y')).toBe('1')
    expect(ids('x')).toBe('0')
  })

  it('integer provider honors a custom start', () => {
    const ids = createIntegerIdProvider<string>(1)
    expect(ids('x')).toBe('1')
    expect(ids('y')).toBe('2')
  })

  it('toString provider uses the display string', () => {
    const ids = createToStringIdProvider<DefaultEdge<string>>()
    expect(ids(new DefaultEdge('a', 'b'))).toBe('(a : b)')
  })
})
