import { graphFromSerialized, SerializedGraphSchema } from '@gmlkit/graph'
import { describe, expect, it } from 'vitest'

describe('SerializedGraphSchema', () => {
  it('applies defaults for direction, weighting and edges', () => {
    const data = SerializedGraphSchema.parse({ vertices: [{ id: 'a' }] })
    expect(data.directed).toBe(true)
    expect(data.weighted).toBe(false)
    expect(data.edges).toEqual([])
  })

  it('rejects edges without a target', () => {
    const result = SerializedGraphSchema.safeParse({
      vertices: [{ id: 'a' }],
      edges: [{ source: 'a' }],
    })
    expect(result.success).toBe(false)
  })

  it('rejects non-scalar attribute values', () => {
    const result = SerializedGraphSchema.safeParse({
      vertices: [{ id: 'a', attrs: { label: { nested: true } } }],
    })
    expect(result.success).toBe(false)
  })
})

describe('graphFromSerialized', () => {
  const data = SerializedGraphSchema.parse({
    directed: false,
    weighted: true,
    vertices: [
      { id: 'b', attrs: { label: 'hub', rank: 2 } },
      { id: 'a' },
    ],
    edges: [
      { id: 'e1', source: 'a', target: 'b', weight: 2.5, attrs: { label: 'link' } },
      { source: 'b', target: 'b' },
    ],
  })

  it('keeps vertex and edge order', () => {
    const { graph } = graphFromSerialized(data)
    expect([...graph.vertexSet()]).toEqual(['b', 'a'])
    expect([...graph.edgeSet()].map(String)).toEqual(['(a : b)', '(b : b)'])
    expect(graph.getType()).toEqual({ directed: false, weighted: true })
  })

  it('applies declared weights and defaults the rest', () => {
    const { graph } = graphFromSerialized(data)
    const [first, second] = [...graph.edgeSet()]
    expect(first && graph.getEdgeWeight(first)).toBe(2.5)
    expect(second && graph.getEdgeWeight(second)).toBe(1)
  })

  it('exposes attributes and edge ids', () => {
    const { graph, vertexAttributes, edgeAttributes, edgeIds } = graphFromSerialized(data)
    const [first, second] = [...graph.edgeSet()]

    expect(vertexAttributes('b', 'label')?.value).toBe('hub')
    expect(vertexAttributes('b', 'rank')).toEqual({ type: 'int', value: '2' })
    expect(vertexAttributes('a', 'label')).toBeUndefined()
    expect(first && edgeAttributes(first, 'label')?.value).toBe('link')
    expect(first && edgeIds(first)).toBe('e1')
    expect(second && edgeIds(second)).toBeUndefined()
  })

  it('throws on duplicate vertex ids', () => {
    const dup = SerializedGraphSchema.parse({ vertices: [{ id: 'a' }, { id: 'a' }] })
    expect(() => graphFromSerialized(dup)).toThrow('Duplicate vertex id: a')
  })

  it('throws on edges that reference unknown vertices', () => {
    const dangling = SerializedGraphSchema.parse({
      vertices: [{ id: 'a' }],
      edges: [{ source: 'a', target: 'x' }],
    })
    expect(() => graphFromSerialized(dangling)).toThrow('Unknown target vertex: x')
  })
})
