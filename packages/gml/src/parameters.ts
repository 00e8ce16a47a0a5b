/**
 * Toggles that shape the exported document.
 */
export const GmlParameter = {
  /** Write a `label` for every edge, from its "label" attribute or display string */
  EXPORT_EDGE_LABELS: 'EXPORT_EDGE_LABELS',
  /** Write a `label` for every vertex, from its "label" attribute or display string */
  EXPORT_VERTEX_LABELS: 'EXPORT_VERTEX_LABELS',
  /** Write edge weights; has no effect on unweighted graphs */
  EXPORT_EDGE_WEIGHTS: 'EXPORT_EDGE_WEIGHTS',
  /** Escape quoted strings as string literals instead of writing them raw */
  ESCAPE_STRINGS_AS_JAVA: 'ESCAPE_STRINGS_AS_JAVA',
} as const

export type GmlParameter = (typeof GmlParameter)[keyof typeof GmlParameter]

export class GmlParameters {
  private readonly enabled = new Set<GmlParameter>()

  isSet(p: GmlParameter): boolean {
    return this.enabled.has(p)
  }

  set(p: GmlParameter, value: boolean): void {
    if (value) {
      this.enabled.add(p)
    }
    else {
      this.enabled.delete(p)
    }
  }
}
